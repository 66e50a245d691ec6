export const PRIORITY_PREFIXES: readonly string[] = Object.freeze([
    'contact', 'info', 'support', 'hello', 'sales',
    'business', 'inquiry', 'general', 'help'
]);

export function localPartOf(address: string): string {
    return address.split('@')[0].toLowerCase();
}

export function isPriorityAddress(address: string): boolean {
    const local = localPartOf(address);
    return PRIORITY_PREFIXES.some(prefix => local.startsWith(prefix));
}

/** Business-contact addresses first; discovery order within each group. */
export function prioritize(addresses: readonly string[]): string[] {
    const priority: string[] = [];
    const other: string[] = [];

    for (const address of addresses) {
        if (isPriorityAddress(address)) {
            priority.push(address);
        } else {
            other.push(address);
        }
    }

    return [...priority, ...other];
}

export function pickBest(ranked: readonly string[]): string | undefined {
    return ranked.length > 0 ? ranked[0] : undefined;
}
