// Placeholder domains, machine senders and no-reply markers. Matched as substrings,
// so "contest@foo.com" is dropped by "test@" as well.
export const DENY_PATTERNS: readonly string[] = Object.freeze([
    'example.com', 'test.com', 'domain.com', 'email.com',
    'yourdomain.com', 'yoursite.com', 'sentry.io',
    'wixpress.com', 'example@', 'test@', 'noreply',
    'no-reply', 'donotreply', 'mailer-daemon'
]);

const TRAILING_PUNCTUATION = /[.,;:!?]+$/;
const LOCAL_PART = /^[a-zA-Z0-9._%+-]+$/;

export function normalizeCandidate(candidate: string): string {
    return candidate.toLowerCase().trim().replace(TRAILING_PUNCTUATION, '');
}

export function isDenied(address: string): boolean {
    return DENY_PATTERNS.some(pattern => address.includes(pattern));
}

export function isValidAddress(address: string): boolean {
    if (!address || address.length < 5) return false;

    const parts = address.split('@');
    if (parts.length !== 2) return false;

    const [local, domain] = parts;
    if (!local || !domain) return false;
    if (!domain.includes('.')) return false;

    return LOCAL_PART.test(local);
}

/**
 * Normalizes candidates and keeps the first occurrence of every address that
 * survives the deny-list and the structural checks. Rejections are silent.
 */
export function filterCandidates(candidates: readonly string[]): string[] {
    const cleaned: string[] = [];
    const seen = new Set<string>();

    for (const candidate of candidates) {
        const address = normalizeCandidate(candidate);

        if (seen.has(address)) continue;
        if (isDenied(address)) continue;
        if (!isValidAddress(address)) continue;

        seen.add(address);
        cleaned.push(address);
    }

    return cleaned;
}
