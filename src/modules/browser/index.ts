import fs from 'fs';
import os from 'os';
import puppeteer, { Browser, Page, TimeoutError } from 'puppeteer-core';
import { getConfig } from '../../config';
import { logger } from '../observability';
import { PageFetcher, PageFetchResult } from '../../types';
import { ConfigurationError, errorMessage } from '../../utils/errors';
import { sleep } from '../../utils/time';

export interface BrowserFetcherOptions {
    headless: boolean;
    timeoutMs: number;
    settleMs: number;
    userAgent: string;
    executablePath?: string | null;
}

const LINUX_CHROME_PATHS = [
    '/usr/bin/google-chrome',
    '/usr/bin/google-chrome-stable',
    '/usr/bin/chromium',
    '/usr/bin/chromium-browser',
    '/snap/bin/chromium'
];

const MAC_CHROME_PATH = '/Applications/Google Chrome.app/Contents/MacOS/Google Chrome';

function getSandboxArgs(): string[] {
    const inDocker = process.env.RUNNING_IN_DOCKER === 'true' || fs.existsSync('/.dockerenv');
    return inDocker ? ['--no-sandbox', '--disable-setuid-sandbox'] : [];
}

export function resolveExecutablePath(configured?: string | null): string {
    if (configured) return configured;

    const candidates = os.platform() === 'darwin' ? [MAC_CHROME_PATH] : LINUX_CHROME_PATHS;
    const found = candidates.find(p => fs.existsSync(p));
    if (!found) {
        throw new ConfigurationError(
            'No Chrome/Chromium executable found. Set CHROME_EXECUTABLE_PATH or crawler.executable_path.'
        );
    }
    return found;
}

/**
 * Headless Chrome fetcher. Waits for the network to settle, then a little longer
 * for client-rendered contact blocks, before reading the DOM.
 */
export class BrowserPageFetcher implements PageFetcher {
    readonly name = 'browser';
    private browser: Browser | null = null;
    private launchPromise: Promise<Browser> | null = null;
    private options: BrowserFetcherOptions;

    constructor(options?: Partial<BrowserFetcherOptions>) {
        const config = getConfig();
        this.options = {
            headless: options?.headless ?? config.crawler.headless,
            timeoutMs: options?.timeoutMs ?? config.crawler.timeout_ms,
            settleMs: options?.settleMs ?? config.crawler.settle_ms,
            userAgent: options?.userAgent ?? config.crawler.user_agent,
            executablePath: options?.executablePath ?? config.crawler.executable_path,
        };
    }

    private async getBrowser(): Promise<Browser> {
        if (this.browser?.connected) return this.browser;
        if (this.launchPromise) return this.launchPromise;

        this.launchPromise = (async () => {
            const executablePath = resolveExecutablePath(this.options.executablePath);
            logger.log('info', `Launching browser (${executablePath}, headless=${this.options.headless})`);

            const browser = await puppeteer.launch({
                headless: this.options.headless,
                executablePath,
                args: [
                    ...getSandboxArgs(),
                    '--disable-dev-shm-usage',
                    '--disable-gpu',
                    '--disable-extensions',
                    '--window-size=1920,1080'
                ]
            });
            browser.once('disconnected', () => {
                if (this.browser === browser) this.browser = null;
            });
            this.browser = browser;
            return browser;
        })();

        try {
            return await this.launchPromise;
        } finally {
            this.launchPromise = null;
        }
    }

    async fetch(url: string): Promise<PageFetchResult> {
        let page: Page | null = null;

        try {
            const browser = await this.getBrowser();
            page = await browser.newPage();
            page.setDefaultTimeout(this.options.timeoutMs);

            await page.setUserAgent(this.options.userAgent);
            const response = await page.goto(url, {
                waitUntil: 'networkidle2',
                timeout: this.options.timeoutMs
            });

            if (!response) {
                return { ok: false, kind: 'HTTP_STATUS', detail: 'HTTP No response' };
            }
            if (response.status() !== 200) {
                return { ok: false, kind: 'HTTP_STATUS', detail: `HTTP ${response.status()}`, status: response.status() };
            }

            if (this.options.settleMs > 0) await sleep(this.options.settleMs);

            return {
                ok: true,
                status: response.status(),
                html: await page.content(),
                finalUrl: page.url()
            };
        } catch (error) {
            if (error instanceof TimeoutError) {
                return { ok: false, kind: 'TIMEOUT', detail: 'Page load timeout' };
            }
            logger.log('warn', `Browser fetch failed for ${url}: ${errorMessage(error)}`);
            return { ok: false, kind: 'NETWORK', detail: errorMessage(error) };
        } finally {
            if (page) {
                await page.close().catch((e: unknown) => {
                    logger.log('debug', `Page close failed for ${url}: ${errorMessage(e)}`);
                });
            }
        }
    }

    async close(): Promise<void> {
        if (this.browser) {
            const browser = this.browser;
            this.browser = null;
            await browser.close();
        }
    }
}
