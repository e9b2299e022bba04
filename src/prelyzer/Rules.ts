import { Keyword, Punctuator, keywordSpelling, punctuatorSpelling } from "../types/Lexer.js";

export interface PunctuatorRule {
    readonly spelling: string;
    readonly punctuator: Punctuator;
}

function enumValues<E extends number>(e: object): E[] {
    return Object.values(e).filter((v): v is E => typeof v === "number");
}

export const KEYWORDS: ReadonlyMap<string, Keyword> = new Map(
    enumValues<Keyword>(Keyword).map((kw) => [keywordSpelling(kw), kw] as const)
);

// `//=` has a spelling but no rule: it lexes as `//` followed by `=`.
const UNMATCHED_PUNCTUATORS: ReadonlySet<Punctuator> = new Set([Punctuator.DoubleSlashEquals]);

/**
 * Matchable punctuators, longest spelling first, so the first match at a position is the longest one
 * (`<<=` before `<<` before `<`).
 */
export const PUNCTUATOR_RULES: readonly PunctuatorRule[] = Object.freeze(
    enumValues<Punctuator>(Punctuator)
        .filter((punctuator) => !UNMATCHED_PUNCTUATORS.has(punctuator))
        .map((punctuator) => Object.freeze({ spelling: punctuatorSpelling(punctuator), punctuator }))
        .sort((a, b) => b.spelling.length - a.spelling.length)
);

export function isWhitespace(char: string): boolean {
    return char === " " || char === "\t" || char === "\n" || char === "\r";
}

export function isIdentifierStart(char: string): boolean {
    return (char >= "a" && char <= "z") || (char >= "A" && char <= "Z") || char === "_";
}

export function isIdentifierPart(char: string): boolean {
    return isIdentifierStart(char) || (char >= "0" && char <= "9");
}
