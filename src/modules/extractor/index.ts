import { collectMarkup } from './collector';
import { matchAddresses, matchAll } from './matcher';
import { filterCandidates } from './filter';
import { baseDomainOf, isDomainRelated } from './relevance';
import { isPriorityAddress, pickBest, prioritize } from './ranker';

export { matchAddresses } from './matcher';
export { collectMarkup } from './collector';
export type { CollectedMarkup } from './collector';
export { DENY_PATTERNS, filterCandidates, isValidAddress, normalizeCandidate } from './filter';
export { baseDomainOf } from './relevance';
export { PRIORITY_PREFIXES, isPriorityAddress, prioritize, pickBest } from './ranker';

export interface AddressAnalysis {
    address: string;
    priority: boolean;
    related: boolean;
}

/**
 * Turns page markup into a ranked list of plausible contact addresses.
 *
 * The site URL only anchors the relevance check; addresses on unrelated
 * domains are reported through `analyze()` but still returned.
 */
export class EmailExtractor {
    readonly baseDomain?: string;

    constructor(readonly siteUrl?: string) {
        this.baseDomain = baseDomainOf(siteUrl);
    }

    extract(markup: string | null | undefined): string[] {
        if (!markup) return [];

        const { text, attributeValues } = collectMarkup(markup);
        const candidates = [...matchAddresses(text), ...matchAll(attributeValues)];

        return prioritize(filterCandidates(candidates));
    }

    analyze(markup: string | null | undefined): AddressAnalysis[] {
        return this.extract(markup).map(address => ({
            address,
            priority: isPriorityAddress(address),
            related: this.isDomainRelated(address)
        }));
    }

    best(markup: string | null | undefined): string | undefined {
        return pickBest(this.extract(markup));
    }

    isDomainRelated(address: string): boolean {
        return isDomainRelated(address, this.baseDomain);
    }
}
