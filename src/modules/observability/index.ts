import winston from 'winston';
import 'winston-daily-rotate-file';
import { OutcomeRecord, ProcessStatus } from '../../types';

export class Logger {
    private logger: winston.Logger;

    constructor() {
        const isTest = process.env.NODE_ENV === 'test';
        const consoleTransport = new winston.transports.Console({ format: winston.format.simple(), silent: isTest });

        // No rotating file under test, it would keep a stream open after the run
        const transports = isTest ? [consoleTransport] : [
            consoleTransport,
            new winston.transports.DailyRotateFile({
                filename: 'logs/contact-finder-%DATE%.log',
                datePattern: 'YYYY-MM-DD',
                zippedArchive: true,
                maxSize: '20m',
                maxFiles: '14d'
            })
        ];

        this.logger = winston.createLogger({
            level: process.env.LOG_LEVEL || 'info',
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.json()
            ),
            transports
        });
    }

    log(level: string, message: string, meta?: Record<string, unknown>) {
        this.logger.log(level, message, meta);
    }
}

export const logger = new Logger();

type StatusCounts = Record<ProcessStatus, number>;

const emptyCounts = (): StatusCounts => ({
    [ProcessStatus.SUCCESS]: 0,
    [ProcessStatus.FAILED]: 0,
    [ProcessStatus.NO_EMAIL_FOUND]: 0,
    [ProcessStatus.SEND_FAILED]: 0,
    [ProcessStatus.FOUND_NOT_SENT]: 0,
    [ProcessStatus.ERROR]: 0,
});

export class Metrics {
    stats = {
        total: 0,
        by_status: emptyCounts(),
        total_latency: 0
    };

    record(result: OutcomeRecord, latencyMs: number) {
        this.stats.total++;
        this.stats.by_status[result.status]++;
        this.stats.total_latency += latencyMs;
    }

    getSummary() {
        return {
            ...this.stats,
            avg_latency: this.stats.total > 0 ? Math.round(this.stats.total_latency / this.stats.total) : 0
        };
    }

    reset() {
        this.stats = { total: 0, by_status: emptyCounts(), total_latency: 0 };
    }
}

export const metrics = new Metrics();
