import {
    DENY_PATTERNS,
    filterCandidates,
    isDenied,
    isValidAddress,
    normalizeCandidate
} from '../src/modules/extractor/filter';

describe('Candidate Filter', () => {
    test('Normalizes case, whitespace and trailing punctuation', () => {
        expect(normalizeCandidate(' Info@Acme.io.,;! ')).toBe('info@acme.io');
    });

    test('Matches deny patterns as substrings', () => {
        expect(isDenied('info@sentry.io')).toBe(true);
        expect(isDenied('contest@acme.io')).toBe(true);
        expect(isDenied('do-not-reply@acme.io')).toBe(false);
        expect(isDenied('donotreply@acme.io')).toBe(true);
        expect(DENY_PATTERNS).toContain('noreply');
    });

    test.each([
        ['a@b.c', true],
        ['team@acme.io', true],
        ['x@y', false],
        ['a@bc', false],
        ['@b.co', false],
        ['ab@', false],
        ['a b@c.io', false],
        ['ab@c@d.io', false],
    ])('isValidAddress(%s) is %s', (address, expected) => {
        expect(isValidAddress(address)).toBe(expected);
    });

    test('Keeps the first accepted occurrence of each address', () => {
        const res = filterCandidates([
            'Info@Acme.io', 'INFO@acme.io.', 'noreply@acme.io', 'bad@@x.io', 'sales@acme.io'
        ]);
        expect(res).toEqual(['info@acme.io', 'sales@acme.io']);
    });
});
