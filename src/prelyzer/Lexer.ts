import { type Token, EOF, ident, keyword, punct, str } from "../types/Lexer.js";
import { type Result, capture, syntaxError } from "../types/Errors.js";
import { KEYWORDS, PUNCTUATOR_RULES, isIdentifierPart, isIdentifierStart, isWhitespace } from "./Rules.js";

const TRIPLE_QUOTE = '"""';

export class Lexer {
    private pos = 0;
    private start = 0;
    private readonly input: string;

    constructor(input: string) {
        this.input = input;
    }

    /** Current cursor position, as an index into the input string. */
    get offset(): number {
        return this.pos;
    }

    /** String index where the most recently returned token started, after skipped whitespace and comments. */
    get tokenStart(): number {
        return this.start;
    }

    /** UTF-8 byte offset of a string index. Errors report positions in bytes. */
    byteOffset(index: number): number {
        return Buffer.byteLength(this.input.slice(0, index), "utf8");
    }

    remainingInput(): string {
        return this.input.slice(this.pos);
    }

    /**
     * Returns the next token, or `Eof` at the end of the input.
     * Throws a `StarlarkSyntaxError` for unterminated strings and characters that start no token.
     */
    nextToken(): Token {
        this.skipCommentsAndWhitespace();
        this.start = this.pos;

        if (this.pos >= this.input.length) {
            return EOF;
        }

        if (this.input.startsWith(TRIPLE_QUOTE, this.pos)) {
            return this.multilineString();
        }

        const char = this.input.charAt(this.pos);

        if (char === '"') {
            return this.string();
        }

        if (isIdentifierStart(char)) {
            return this.identifier();
        }

        return this.punctuator();
    }

    private skipCommentsAndWhitespace(): void {
        let skipping = true;
        while (skipping) {
            skipping = false;
            while (this.pos < this.input.length && isWhitespace(this.input.charAt(this.pos))) {
                this.pos++;
            }

            if (this.input.charAt(this.pos) === "#") {
                skipping = true;
                const newline = this.input.indexOf("\n", this.pos);
                this.pos = newline === -1 ? this.input.length : newline;
            }
        }
    }

    // TODO: decode escape sequences in both string forms.
    private multilineString(): Token {
        const contentStart = this.pos + TRIPLE_QUOTE.length;
        const end = this.input.indexOf(TRIPLE_QUOTE, contentStart);
        if (end === -1) {
            throw syntaxError(
                "unterminated-multiline-string",
                this.byteOffset(this.start),
                "Unterminated multiline string",
                TRIPLE_QUOTE,
                "end of input"
            );
        }

        this.pos = end + TRIPLE_QUOTE.length;
        return str(this.input.slice(contentStart, end));
    }

    private string(): Token {
        const contentStart = this.pos + 1;
        const end = this.input.indexOf('"', contentStart);
        if (end === -1) {
            throw syntaxError(
                "unterminated-string",
                this.byteOffset(this.start),
                "Unterminated string",
                '"',
                "end of input"
            );
        }

        this.pos = end + 1;
        return str(this.input.slice(contentStart, end));
    }

    private identifier(): Token {
        while (this.pos < this.input.length && isIdentifierPart(this.input.charAt(this.pos))) {
            this.pos++;
        }

        const name = this.input.slice(this.start, this.pos);
        const kw = KEYWORDS.get(name);
        return kw === undefined ? ident(name) : keyword(kw);
    }

    private punctuator(): Token {
        for (const rule of PUNCTUATOR_RULES) {
            if (this.input.startsWith(rule.spelling, this.pos)) {
                this.pos += rule.spelling.length;
                return punct(rule.punctuator);
            }
        }

        const char = String.fromCodePoint(this.input.codePointAt(this.pos) ?? 0);
        throw syntaxError(
            "unrecognized-character",
            this.byteOffset(this.pos),
            `Unrecognized character '${char}'`,
            undefined,
            char
        );
    }
}

export type TokenizeResult = Result<Token[], "tokens">;

/**
 * Tokenizes the whole input. `Eof` ends the sequence and is not included.
 * The first error discards everything read so far.
 */
export function tokenize(input: string): TokenizeResult {
    const result = capture(() => {
        const lexer = new Lexer(input);
        const tokens: Token[] = [];
        for (let token = lexer.nextToken(); token.kind !== "eof"; token = lexer.nextToken()) {
            tokens.push(token);
        }
        return tokens;
    });
    return result.ok ? { ok: true, tokens: result.value } : result;
}
