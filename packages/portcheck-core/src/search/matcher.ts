import { MatcherKind } from '../types/index.js';

/**
 * Decides whether a candidate file's text accounts for a symbol name.
 * `loweredText` is already lower-cased; implementations lower-case the name.
 */
export interface Matcher {
    readonly id: MatcherKind;
    matches(loweredText: string, name: string): boolean;
}

/** Plain containment: `add` is satisfied by `addition`. */
export class SubstringMatcher implements Matcher {
    readonly id = 'substring' as const;

    matches(loweredText: string, name: string): boolean {
        return loweredText.includes(name.toLowerCase());
    }
}

const IDENTIFIER_CHAR = /[a-z0-9_]/;

/** Containment that must not run into neighbouring identifier characters. */
export class IdentifierMatcher implements Matcher {
    readonly id = 'identifier' as const;

    matches(loweredText: string, name: string): boolean {
        const needle = name.toLowerCase();
        if (needle.length === 0) return true;

        let from = 0;
        while (from <= loweredText.length - needle.length) {
            const index = loweredText.indexOf(needle, from);
            if (index === -1) return false;
            const before = index > 0 ? loweredText[index - 1] : '';
            const after = loweredText.charAt(index + needle.length);
            if (!IDENTIFIER_CHAR.test(before) && !IDENTIFIER_CHAR.test(after)) {
                return true;
            }
            from = index + 1;
        }
        return false;
    }
}

export function createMatcher(kind: MatcherKind): Matcher {
    switch (kind) {
        case 'identifier':
            return new IdentifierMatcher();
        case 'substring':
            return new SubstringMatcher();
    }
}
