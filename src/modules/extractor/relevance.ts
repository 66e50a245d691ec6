const LEADING_WWW = /^www\./;

/**
 * Host of the site URL, lower-cased, without a leading "www.".
 * Returns undefined when the URL cannot be parsed.
 */
export function baseDomainOf(siteUrl?: string | null): string | undefined {
    const trimmed = siteUrl?.trim();
    if (!trimmed) return undefined;

    const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
    try {
        const host = new URL(withScheme).hostname.toLowerCase().replace(LEADING_WWW, '');
        return host || undefined;
    } catch {
        return undefined;
    }
}

// Compares the last two labels only; "a.co.uk" and "b.co.uk" count as related.
export function isDomainRelated(address: string, baseDomain?: string): boolean {
    if (!baseDomain) return true;

    const at = address.indexOf('@');
    if (at < 0) return false;

    const emailDomain = address.slice(at + 1).toLowerCase().replace(LEADING_WWW, '');
    if (!emailDomain) return false;

    if (emailDomain === baseDomain) return true;
    if (emailDomain.endsWith('.' + baseDomain)) return true;

    const baseParts = baseDomain.split('.');
    const emailParts = emailDomain.split('.');
    if (baseParts.length >= 2 && emailParts.length >= 2) {
        return baseParts.slice(-2).join('.') === emailParts.slice(-2).join('.');
    }

    return false;
}
