import fs from 'fs';
import Bottleneck from 'bottleneck';
import { Config, CrawlEngine, OutputFormat } from '../config';
import { SiteCrawler } from '../modules/crawler';
import { BrowserPageFetcher } from '../modules/browser';
import { HttpPageFetcher } from '../modules/fetcher';
import { EmailExtractor } from '../modules/extractor';
import { DEFAULT_EMAIL_TEMPLATE, GmailSender } from '../modules/sender';
import { GoogleMailboxClient, authorizeGmail } from '../modules/sender/google-client';
import { ResultStorage, SavedFiles } from '../modules/storage';
import { logger, metrics } from '../modules/observability';
import { MessageDispatcher, OutcomeRecord, PageFetcher, ProcessStatus } from '../types';
import { errorMessage } from '../utils/errors';
import { formatTimestamp } from '../utils/time';

export interface AutomationOptions {
    crawler: SiteCrawler;
    storage: ResultStorage;
    dispatcher?: MessageDispatcher | null;
    sendEmails: boolean;
    subject: string;
    body: string;
    pacingMs: number;
    tryContactPages?: boolean;
    extractorFactory?: (siteUrl: string) => EmailExtractor;
}

export interface AutomationOverrides {
    sendEmails?: boolean;
    headless?: boolean;
    engine?: CrawlEngine;
    subject?: string;
    bodyFile?: string;
    credentialsFile?: string;
    tokenFile?: string;
    outputDir?: string;
}

export interface RunSummary {
    total: number;
    success: number;
    noEmail: number;
    failed: number;
}

export class ContactAutomation {
    private crawler: SiteCrawler;
    private storage: ResultStorage;
    private dispatcher: MessageDispatcher | null;
    private sendEmails: boolean;
    private subject: string;
    private body: string;
    private tryContactPages: boolean;
    private limiter: Bottleneck;
    private extractorFactory: (siteUrl: string) => EmailExtractor;

    constructor(options: AutomationOptions) {
        this.crawler = options.crawler;
        this.storage = options.storage;
        this.dispatcher = options.dispatcher ?? null;
        this.sendEmails = options.sendEmails && this.dispatcher !== null;
        this.subject = options.subject;
        this.body = options.body;
        this.tryContactPages = options.tryContactPages ?? true;
        this.extractorFactory = options.extractorFactory ?? (siteUrl => new EmailExtractor(siteUrl));
        // one site at a time, at least pacingMs apart
        this.limiter = new Bottleneck({ maxConcurrent: 1, minTime: options.pacingMs });
    }

    /**
     * Builds the real collaborators from config. A Gmail authorization failure
     * is not fatal: the run continues and only reports the addresses found.
     */
    static async create(config: Config, overrides: AutomationOverrides = {}): Promise<ContactAutomation> {
        const engine = overrides.engine ?? config.crawler.engine;
        const fetcher: PageFetcher = engine === 'http'
            ? new HttpPageFetcher()
            : new BrowserPageFetcher({ headless: overrides.headless ?? config.crawler.headless });

        const bodyFile = overrides.bodyFile ?? config.dispatch.body_file;
        const body = bodyFile ? fs.readFileSync(bodyFile, 'utf-8') : DEFAULT_EMAIL_TEMPLATE;

        const sendEmails = overrides.sendEmails ?? config.dispatch.enabled;
        let dispatcher: MessageDispatcher | null = null;

        if (sendEmails) {
            try {
                const auth = await authorizeGmail({
                    credentialsFile: overrides.credentialsFile ?? config.dispatch.credentials_file,
                    tokenFile: overrides.tokenFile ?? config.dispatch.token_file,
                });
                dispatcher = new GmailSender(new GoogleMailboxClient(auth), {
                    maxAttempts: config.dispatch.max_attempts
                });
                const sender = await dispatcher.senderIdentity();
                logger.log('info', 'Gmail API authenticated successfully');
                logger.log('info', `Emails will be sent from: ${sender}`);
            } catch (e) {
                logger.log('error', `Failed to initialize Gmail sender: ${errorMessage(e)}`);
                logger.log('warn', 'Continuing without email sending capability');
                dispatcher = null;
            }
        }

        return new ContactAutomation({
            crawler: new SiteCrawler(fetcher, config.crawler.contact_paths),
            storage: new ResultStorage(overrides.outputDir ?? config.storage.output_dir),
            dispatcher,
            sendEmails,
            subject: overrides.subject ?? config.dispatch.subject,
            body,
            pacingMs: config.pacing.delay_ms,
            tryContactPages: config.crawler.try_contact_pages,
        });
    }

    get isSending(): boolean {
        return this.sendEmails;
    }

    async processCompany(url: string): Promise<OutcomeRecord> {
        logger.log('info', `Processing: ${url}`);

        const result: OutcomeRecord = {
            company: url,
            url,
            resolvedUrl: '',
            emailFound: '',
            status: ProcessStatus.FAILED,
            messageId: '',
            error: '',
            senderEmail: '',
            timestamp: formatTimestamp()
        };

        try {
            if (this.dispatcher) result.senderEmail = await this.dispatcher.senderIdentity();

            const crawl = await this.crawler.crawl(url, this.tryContactPages);

            if (!crawl.ok) {
                result.error = `Crawl failed: ${crawl.error}`;
                logger.log('warn', `Failed to crawl ${url}: ${result.error}`, { kind: crawl.kind });
                return result;
            }
            result.resolvedUrl = crawl.finalUrl;

            const extractor = this.extractorFactory(url);
            const found = extractor.analyze(crawl.html);

            if (found.length === 0) {
                result.error = 'No email addresses found';
                result.status = ProcessStatus.NO_EMAIL_FOUND;
                logger.log('warn', `No emails found for ${url}`);
                return result;
            }

            const best = found[0];
            result.emailFound = best.address;
            logger.log('info', `Found email: ${best.address} for ${url}`, {
                candidates: found.length,
                related: best.related
            });
            if (!best.related) {
                logger.log('warn', `${best.address} is not on the domain of ${url}`);
            }

            if (this.sendEmails && this.dispatcher) {
                const sent = await this.dispatcher.dispatch(best.address, this.subject, this.body);

                if (sent.success) {
                    result.status = ProcessStatus.SUCCESS;
                    result.messageId = sent.messageId;
                    logger.log('info', `Email sent successfully to ${best.address}`);
                } else {
                    result.status = ProcessStatus.SEND_FAILED;
                    result.error = sent.error;
                    logger.log('error', `Failed to send email to ${best.address}: ${sent.error}`, { kind: sent.kind });
                }
            } else {
                result.status = ProcessStatus.FOUND_NOT_SENT;
                logger.log('info', `Email found but not sent (send_emails=${this.sendEmails})`);
            }
        } catch (e) {
            result.error = `Unexpected error: ${errorMessage(e)}`;
            result.status = ProcessStatus.ERROR;
            logger.log('error', `Error processing ${url}: ${errorMessage(e)}`, {
                stack: e instanceof Error ? e.stack : undefined
            });
        }

        return result;
    }

    async processCompanies(urls: readonly string[]): Promise<OutcomeRecord[]> {
        const results: OutcomeRecord[] = [];
        const total = urls.length;

        logger.log('info', `Starting processing of ${total} companies`);

        for (const [index, url] of urls.entries()) {
            const start = Date.now();
            logger.log('info', `Processing ${index + 1}/${total}: ${url}`);

            const result = await this.limiter.schedule(() => this.processCompany(url));
            results.push(result);
            metrics.record(result, Date.now() - start);
        }

        return results;
    }

    async saveResults(records: readonly OutcomeRecord[], format: OutputFormat = 'all'): Promise<SavedFiles> {
        return this.storage.save(records, format);
    }

    async close(): Promise<void> {
        await this.crawler.close();
    }
}

export function summarize(records: readonly OutcomeRecord[]): RunSummary {
    const total = records.length;
    const success = records.filter(r => r.status === ProcessStatus.SUCCESS).length;
    const noEmail = records.filter(r => r.status === ProcessStatus.NO_EMAIL_FOUND).length;
    return { total, success, noEmail, failed: total - success - noEmail };
}
