import { getConfig } from '../../config';
import { logger } from '../observability';
import { CrawlResult, FetchErrorKind, PageFetcher } from '../../types';

export function ensureScheme(url: string): string {
    const trimmed = url.trim();
    return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

function canonical(url: string): string {
    try {
        return new URL(url).href;
    } catch {
        return url;
    }
}

/**
 * The site URL followed by the common contact-page guesses, resolved against it
 * and deduplicated in order.
 */
export function planUrls(url: string, contactPaths: readonly string[], tryContactPages = true): string[] {
    const target = ensureScheme(url);
    const planned = [target];

    if (tryContactPages) {
        const base = target.replace(/\/+$/, '');
        for (const path of contactPaths) {
            try {
                planned.push(new URL(path, base).href);
            } catch {
                logger.log('warn', `Skipping contact path "${path}" for ${base}: not a valid URL`);
            }
        }
    }

    const seen = new Set<string>();
    const unique: string[] = [];
    for (const candidate of planned) {
        const key = canonical(candidate);
        if (!seen.has(key)) {
            seen.add(key);
            unique.push(candidate);
        }
    }
    return unique;
}

export class SiteCrawler {
    private contactPaths: readonly string[];

    constructor(private fetcher: PageFetcher, contactPaths?: readonly string[]) {
        this.contactPaths = contactPaths ?? getConfig().crawler.contact_paths;
    }

    async crawl(url: string, tryContactPages = true): Promise<CrawlResult> {
        const target = ensureScheme(url);
        const urlsToTry = planUrls(target, this.contactPaths, tryContactPages);

        let lastError: { kind: FetchErrorKind; detail: string } | null = null;

        for (const tryUrl of urlsToTry) {
            const result = await this.fetcher.fetch(tryUrl);

            if (result.ok) {
                logger.log('debug', `Loaded ${tryUrl} via ${this.fetcher.name}`);
                return { ok: true, url: target, finalUrl: result.finalUrl, html: result.html };
            }

            lastError = { kind: result.kind, detail: result.detail };
            logger.log('debug', `Could not load ${tryUrl}: ${result.detail}`);
        }

        return {
            ok: false,
            url: target,
            finalUrl: target,
            kind: lastError?.kind ?? 'NETWORK',
            error: lastError?.detail ?? 'Failed to load page'
        };
    }

    async crawlMany(urls: readonly string[], tryContactPages = true): Promise<CrawlResult[]> {
        const results: CrawlResult[] = [];
        for (const url of urls) {
            results.push(await this.crawl(url, tryContactPages));
        }
        return results;
    }

    async close(): Promise<void> {
        await this.fetcher.close();
    }
}
