import fs from 'fs';
import path from 'path';
import * as fastcsv from 'fast-csv';
import ExcelJS from 'exceljs';
import Database from 'better-sqlite3';
import { logger } from '../observability';
import { OutputFormat } from '../../config';
import { OutcomeRecord } from '../../types';
import { fileStamp } from '../../utils/time';

export const RESULT_COLUMNS = [
    'Company', 'URL', 'Resolved URL', 'Email Found', 'Status',
    'Message ID', 'Error', 'Sender Email', 'Timestamp'
] as const;

export type ResultColumn = typeof RESULT_COLUMNS[number];
export type ResultRow = Record<ResultColumn, string>;

export type SavedFiles = Partial<Record<'csv' | 'excel' | 'sqlite', string>>;

export function toRow(record: OutcomeRecord): ResultRow {
    return {
        'Company': record.company,
        'URL': record.url,
        'Resolved URL': record.resolvedUrl,
        'Email Found': record.emailFound,
        'Status': record.status,
        'Message ID': record.messageId,
        'Error': record.error,
        'Sender Email': record.senderEmail,
        'Timestamp': record.timestamp,
    };
}

const COLUMN_WIDTHS: Record<ResultColumn, number> = {
    'Company': 35,
    'URL': 40,
    'Resolved URL': 45,
    'Email Found': 35,
    'Status': 22,
    'Message ID': 22,
    'Error': 50,
    'Sender Email': 30,
    'Timestamp': 20,
};

/**
 * Writes one run's outcome records. All files of a run share the timestamp
 * taken when the storage was created.
 */
export class ResultStorage {
    readonly outputDir: string;
    readonly timestamp: string;

    constructor(outputDir = 'results', now: Date = new Date()) {
        this.outputDir = outputDir;
        fs.mkdirSync(this.outputDir, { recursive: true });
        this.timestamp = fileStamp(now);
    }

    async saveToCsv(records: readonly OutcomeRecord[], filename?: string): Promise<string> {
        const filePath = path.join(this.outputDir, filename || `results_${this.timestamp}.csv`);

        await new Promise<void>((resolve, reject) => {
            fastcsv.writeToPath(filePath, records.map(toRow), {
                headers: [...RESULT_COLUMNS],
                alwaysWriteHeaders: true
            })
                .on('error', reject)
                .on('finish', () => resolve());
        });

        logger.log('info', `Saved ${records.length} results to ${filePath}`);
        return filePath;
    }

    async saveToExcel(records: readonly OutcomeRecord[], filename?: string): Promise<string> {
        const filePath = path.join(this.outputDir, filename || `results_${this.timestamp}.xlsx`);

        const workbook = new ExcelJS.Workbook();
        workbook.created = new Date();
        const worksheet = workbook.addWorksheet('Results', {
            views: [{ state: 'frozen', ySplit: 1 }],
        });

        worksheet.columns = RESULT_COLUMNS.map(column => ({
            header: column,
            key: column,
            width: COLUMN_WIDTHS[column],
        }));
        worksheet.getRow(1).font = { bold: true };
        worksheet.addRows(records.map(toRow));

        await workbook.xlsx.writeFile(filePath);
        logger.log('info', `Saved ${records.length} results to ${filePath}`);
        return filePath;
    }

    saveToSqlite(records: readonly OutcomeRecord[], dbName?: string): string {
        const dbPath = path.join(this.outputDir, dbName || `results_${this.timestamp}.db`);
        const db = new Database(dbPath);

        try {
            db.exec(`
                CREATE TABLE IF NOT EXISTS email_results (
                    id INTEGER PRIMARY KEY AUTOINCREMENT,
                    company TEXT,
                    url TEXT,
                    resolved_url TEXT,
                    email_found TEXT,
                    status TEXT,
                    message_id TEXT,
                    error TEXT,
                    sender_email TEXT,
                    timestamp TEXT,
                    created_at DATETIME DEFAULT CURRENT_TIMESTAMP
                )
            `);

            const insert = db.prepare(`
                INSERT INTO email_results
                (company, url, resolved_url, email_found, status, message_id, error, sender_email, timestamp)
                VALUES (@company, @url, @resolvedUrl, @emailFound, @status, @messageId, @error, @senderEmail, @timestamp)
            `);

            const insertAll = db.transaction((rows: readonly OutcomeRecord[]) => {
                for (const r of rows) {
                    insert.run({
                        company: r.company,
                        url: r.url,
                        resolvedUrl: r.resolvedUrl,
                        emailFound: r.emailFound,
                        status: r.status,
                        messageId: r.messageId,
                        error: r.error,
                        senderEmail: r.senderEmail,
                        timestamp: r.timestamp,
                    });
                }
            });
            insertAll(records);
        } finally {
            db.close();
        }

        logger.log('info', `Saved ${records.length} results to ${dbPath}`);
        return dbPath;
    }

    async saveAll(records: readonly OutcomeRecord[], baseName?: string): Promise<Required<SavedFiles>> {
        return {
            csv: await this.saveToCsv(records, baseName && `${baseName}.csv`),
            excel: await this.saveToExcel(records, baseName && `${baseName}.xlsx`),
            sqlite: this.saveToSqlite(records, baseName && `${baseName}.db`),
        };
    }

    async save(records: readonly OutcomeRecord[], format: OutputFormat): Promise<SavedFiles> {
        switch (format) {
            case 'csv':
                return { csv: await this.saveToCsv(records) };
            case 'excel':
                return { excel: await this.saveToExcel(records) };
            case 'sqlite':
                return { sqlite: this.saveToSqlite(records) };
            case 'all':
                return this.saveAll(records);
        }
    }
}
