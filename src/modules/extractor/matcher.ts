// local-part@domain.tld, scanned over extracted text rather than raw markup
export const EMAIL_PATTERN = /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/gi;

export function matchAddresses(text: string): string[] {
    if (!text) return [];
    return Array.from(text.matchAll(EMAIL_PATTERN), match => match[0]);
}

export function matchAll(sources: readonly string[]): string[] {
    return sources.flatMap(source => matchAddresses(source));
}
