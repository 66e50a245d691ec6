import axios, { AxiosInstance } from 'axios';
import * as rax from 'retry-axios';
import { getConfig } from '../../config';
import { PageFetcher, PageFetchResult } from '../../types';
import { errorMessage } from '../../utils/errors';

export interface HttpFetcherOptions {
    timeoutMs: number;
    retries: number;
    backoffMs: number;
    userAgent: string;
}

const TIMEOUT_CODES = ['ECONNABORTED', 'ETIMEDOUT'];

/**
 * Plain GET fetcher. Faster than the browser but sees only server-rendered markup.
 */
export class HttpPageFetcher implements PageFetcher {
    readonly name = 'http';
    private client: AxiosInstance;

    constructor(options?: Partial<HttpFetcherOptions>) {
        const config = getConfig();
        const resolved: HttpFetcherOptions = {
            timeoutMs: options?.timeoutMs ?? config.crawler.timeout_ms,
            retries: options?.retries ?? config.fetcher.retries,
            backoffMs: options?.backoffMs ?? config.fetcher.backoff_ms,
            userAgent: options?.userAgent ?? config.crawler.user_agent,
        };

        this.client = axios.create({
            timeout: resolved.timeoutMs,
            responseType: 'text',
            headers: {
                'User-Agent': resolved.userAgent,
                'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
                'Accept-Language': 'en-US,en;q=0.9',
            }
        });

        this.client.defaults.raxConfig = {
            instance: this.client,
            retry: resolved.retries,
            retryDelay: resolved.backoffMs,
            httpMethodsToRetry: ['GET', 'HEAD', 'OPTIONS'],
            statusCodesToRetry: [[429, 429], [500, 500], [503, 503]],
            backoffType: 'static'
        };
        rax.attach(this.client);
    }

    async fetch(url: string): Promise<PageFetchResult> {
        try {
            const response = await this.client.get<string>(url);
            const responseUrl: unknown = response.request?.res?.responseUrl;

            if (response.status !== 200) {
                return { ok: false, kind: 'HTTP_STATUS', detail: `HTTP ${response.status}`, status: response.status };
            }

            return {
                ok: true,
                status: response.status,
                html: typeof response.data === 'string' ? response.data : JSON.stringify(response.data),
                finalUrl: typeof responseUrl === 'string' && responseUrl ? responseUrl : url
            };
        } catch (error) {
            if (axios.isAxiosError(error)) {
                if (error.response) {
                    const status = error.response.status;
                    return { ok: false, kind: 'HTTP_STATUS', detail: `HTTP ${status}`, status };
                }
                if (error.code && TIMEOUT_CODES.includes(error.code)) {
                    return { ok: false, kind: 'TIMEOUT', detail: 'Page load timeout' };
                }
            }
            return { ok: false, kind: 'NETWORK', detail: errorMessage(error) };
        }
    }

    async close(): Promise<void> {
        // no pooled resources
    }
}
