// --- Parser ---
//
// Program  = {LoadStmt} Eof .
// LoadStmt = 'load' '(' string {',' [identifier '='] string} [','] ')' .

import { type LoadStmt, type LoadSymbol, type Program, loadStmt, program } from "../types/AST.js";
import {
    type IdentifierToken,
    type StringLiteralToken,
    type Token,
    Keyword,
    Punctuator,
    keywordSpelling,
    punct,
    tokenToString,
    tokensEqual,
} from "../types/Lexer.js";
import { type Result, capture, syntaxError } from "../types/Errors.js";
import { Lexer } from "./Lexer.js";

export class StarlarkParser {
    private readonly lexer: Lexer;

    constructor(input: string) {
        this.lexer = new Lexer(input);
    }

    /**
     * Parses the whole input. Any error aborts the parse; statements parsed before it are discarded.
     */
    parse(): Program {
        const statements: LoadStmt[] = [];

        for (;;) {
            const token = this.lexer.nextToken();

            if (token.kind === "eof") {
                return program(statements);
            }

            if (token.kind === "keyword") {
                if (token.keyword === Keyword.Load) {
                    statements.push(this.parseLoadStmt());
                    continue;
                }

                // Only `load` is implemented, so an earlier `load` does not survive an unsupported statement.
                const word = keywordSpelling(token.keyword);
                throw syntaxError(
                    "unsupported-keyword",
                    this.tokenOffset(),
                    `Unexpected keyword: ${word}`,
                    "load",
                    word
                );
            }

            const actual = tokenToString(token);
            throw syntaxError(
                "unexpected-token",
                this.tokenOffset(),
                `Unexpected token: ${actual}`,
                "statement",
                actual
            );
        }
    }

    // `load` has already been consumed.
    private parseLoadStmt(): LoadStmt {
        this.expect(punct(Punctuator.LParen), "after 'load'");
        const moduleName = this.expectString("module name").value;

        const symbols: LoadSymbol[] = [];
        for (;;) {
            const token = this.next("',' or ')'");
            if (!isPunctuator(token, Punctuator.Comma) && !isPunctuator(token, Punctuator.RParen)) {
                throw this.unexpected(token, "',' or ')'", "in load statement");
            }

            if (isPunctuator(token, Punctuator.RParen)) {
                break;
            }

            const symbol = this.next("symbol name");
            if (symbol.kind === "string") {
                symbols.push({ localName: symbol.value, exportedName: symbol.value });
                continue;
            }

            if (symbol.kind !== "identifier") {
                throw this.unexpected(symbol, "symbol name", "in load statement");
            }

            symbols.push(this.parseAliasedSymbol(symbol));
        }

        if (symbols.length === 0) {
            throw syntaxError(
                "empty-load",
                this.tokenOffset(),
                "Expected at least one symbol in load statement",
                "symbol name",
                ")"
            );
        }

        return loadStmt(moduleName, symbols);
    }

    // local = "exported"
    private parseAliasedSymbol(local: IdentifierToken): LoadSymbol {
        this.expect(punct(Punctuator.Equals), `after '${local.name}'`);
        const exported = this.expectString("symbol name");
        return { localName: local.name, exportedName: exported.value };
    }

    // --- helpers ---

    private tokenOffset(): number {
        return this.lexer.byteOffset(this.lexer.tokenStart);
    }

    private next(expected: string): Token {
        const token = this.lexer.nextToken();
        if (token.kind === "eof") {
            throw syntaxError(
                "unexpected-end-of-input",
                this.tokenOffset(),
                `Unexpected end of input, expected ${expected}`,
                expected,
                tokenToString(token)
            );
        }
        return token;
    }

    private expect(expected: Token, context: string): void {
        const rendered = `'${tokenToString(expected)}'`;
        const token = this.next(rendered);
        if (!tokensEqual(token, expected)) {
            throw this.unexpected(token, rendered, context);
        }
    }

    private expectString(what: string): StringLiteralToken {
        const token = this.next(what);
        if (token.kind !== "string") {
            throw this.unexpected(token, what, "in load statement");
        }
        return token;
    }

    private unexpected(token: Token, expected: string, context: string) {
        const actual = tokenToString(token);
        return syntaxError(
            "unexpected-token",
            this.tokenOffset(),
            `Expected ${expected} ${context}, got ${actual}`,
            expected,
            actual
        );
    }
}

function isPunctuator(token: Token, punctuator: Punctuator): boolean {
    return token.kind === "punctuator" && token.punctuator === punctuator;
}

export type ParseResult = Result<Program, "program">;

export function parse(input: string): ParseResult {
    const result = capture(() => new StarlarkParser(input).parse());
    return result.ok ? { ok: true, program: result.value } : result;
}
