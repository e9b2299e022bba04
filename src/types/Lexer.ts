// --- Token types ---

export enum Punctuator {
    Plus, // +
    Minus, // -
    Star, // *
    Slash, // /
    DoubleSlash, // //
    Percent, // %
    DoubleStar, // **
    Tilde, // ~
    Ampersand, // &
    Pipe, // |
    Caret, // ^
    LShift, // <<
    RShift, // >>
    Dot, // .
    Comma, // ,
    Equals, // =
    Semicolon, // ;
    Colon, // :
    LParen, // (
    RParen, // )
    LBracket, // [
    RBracket, // ]
    LBrace, // {
    RBrace, // }
    Less, // <
    Greater, // >
    GreaterOrEqual, // >=
    LessOrEqual, // <=
    EqualEqual, // ==
    NotEqual, // !=
    PlusEquals, // +=
    MinusEquals, // -=
    StarEquals, // *=
    SlashEquals, // /=
    DoubleSlashEquals, // //=
    PercentEquals, // %=
    AmpersandEquals, // &=
    PipeEquals, // |=
    CaretEquals, // ^=
    LShiftEquals, // <<=
    RShiftEquals, // >>=
}

export enum Keyword {
    And,
    Else,
    Load,
    Break,
    For,
    Not,
    Continue,
    If,
    Or,
    Def,
    In,
    Pass,
    Elif,
    Lambda,
    Return,
}

export interface PunctuatorToken {
    kind: "punctuator";
    punctuator: Punctuator;
}

export interface KeywordToken {
    kind: "keyword";
    keyword: Keyword;
}

export interface IdentifierToken {
    kind: "identifier";
    name: string;
}

/**
 * The value is the raw text between the quotes. Escape sequences are not decoded.
 */
export interface StringLiteralToken {
    kind: "string";
    value: string;
}

export interface EofToken {
    kind: "eof";
}

/**
 * A single lexical token. Tokens do not record where they came from in the source.
 */
export type Token = PunctuatorToken | KeywordToken | IdentifierToken | StringLiteralToken | EofToken;

// --- Spellings ---

const PUNCTUATOR_SPELLINGS: Readonly<Record<Punctuator, string>> = Object.freeze({
    [Punctuator.Plus]: "+",
    [Punctuator.Minus]: "-",
    [Punctuator.Star]: "*",
    [Punctuator.Slash]: "/",
    [Punctuator.DoubleSlash]: "//",
    [Punctuator.Percent]: "%",
    [Punctuator.DoubleStar]: "**",
    [Punctuator.Tilde]: "~",
    [Punctuator.Ampersand]: "&",
    [Punctuator.Pipe]: "|",
    [Punctuator.Caret]: "^",
    [Punctuator.LShift]: "<<",
    [Punctuator.RShift]: ">>",
    [Punctuator.Dot]: ".",
    [Punctuator.Comma]: ",",
    [Punctuator.Equals]: "=",
    [Punctuator.Semicolon]: ";",
    [Punctuator.Colon]: ":",
    [Punctuator.LParen]: "(",
    [Punctuator.RParen]: ")",
    [Punctuator.LBracket]: "[",
    [Punctuator.RBracket]: "]",
    [Punctuator.LBrace]: "{",
    [Punctuator.RBrace]: "}",
    [Punctuator.Less]: "<",
    [Punctuator.Greater]: ">",
    [Punctuator.GreaterOrEqual]: ">=",
    [Punctuator.LessOrEqual]: "<=",
    [Punctuator.EqualEqual]: "==",
    [Punctuator.NotEqual]: "!=",
    [Punctuator.PlusEquals]: "+=",
    [Punctuator.MinusEquals]: "-=",
    [Punctuator.StarEquals]: "*=",
    [Punctuator.SlashEquals]: "/=",
    [Punctuator.DoubleSlashEquals]: "//=",
    [Punctuator.PercentEquals]: "%=",
    [Punctuator.AmpersandEquals]: "&=",
    [Punctuator.PipeEquals]: "|=",
    [Punctuator.CaretEquals]: "^=",
    [Punctuator.LShiftEquals]: "<<=",
    [Punctuator.RShiftEquals]: ">>=",
});

const KEYWORD_SPELLINGS: Readonly<Record<Keyword, string>> = Object.freeze({
    [Keyword.And]: "and",
    [Keyword.Else]: "else",
    [Keyword.Load]: "load",
    [Keyword.Break]: "break",
    [Keyword.For]: "for",
    [Keyword.Not]: "not",
    [Keyword.Continue]: "continue",
    [Keyword.If]: "if",
    [Keyword.Or]: "or",
    [Keyword.Def]: "def",
    [Keyword.In]: "in",
    [Keyword.Pass]: "pass",
    [Keyword.Elif]: "elif",
    [Keyword.Lambda]: "lambda",
    [Keyword.Return]: "return",
});

export function punctuatorSpelling(punctuator: Punctuator): string {
    return PUNCTUATOR_SPELLINGS[punctuator];
}

export function keywordSpelling(keyword: Keyword): string {
    return KEYWORD_SPELLINGS[keyword];
}

// --- Rendering ---

export function tokenToString(token: Token): string {
    switch (token.kind) {
        case "punctuator":
            return punctuatorSpelling(token.punctuator);
        case "keyword":
            return keywordSpelling(token.keyword);
        case "identifier":
            return token.name;
        case "string":
            return `"${token.value}"`;
        case "eof":
            return "<eof>";
    }
}

/**
 * Renders tokens separated by single spaces, e.g. `load ( "m" , "a" )`.
 */
export function formatTokens(tokens: readonly Token[]): string {
    return tokens.map(tokenToString).join(" ");
}

/**
 * Debug dump form: every token is followed by a space, including the last one.
 */
export function dumpTokens(tokens: readonly Token[]): string {
    return tokens.map((token) => tokenToString(token) + " ").join("");
}

export function tokensEqual(a: Token, b: Token): boolean {
    switch (a.kind) {
        case "punctuator":
            return b.kind === "punctuator" && a.punctuator === b.punctuator;
        case "keyword":
            return b.kind === "keyword" && a.keyword === b.keyword;
        case "identifier":
            return b.kind === "identifier" && a.name === b.name;
        case "string":
            return b.kind === "string" && a.value === b.value;
        case "eof":
            return b.kind === "eof";
    }
}

// Shorthand constructors, used by the parser for expectations and by tests.

export const punct = (punctuator: Punctuator): PunctuatorToken => ({ kind: "punctuator", punctuator });
export const keyword = (kw: Keyword): KeywordToken => ({ kind: "keyword", keyword: kw });
export const ident = (name: string): IdentifierToken => ({ kind: "identifier", name });
export const str = (value: string): StringLiteralToken => ({ kind: "string", value });
export const EOF: EofToken = Object.freeze({ kind: "eof" });
