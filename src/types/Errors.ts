// --- Syntax errors ---

export type SyntaxErrorKind =
    | "unterminated-string"
    | "unterminated-multiline-string"
    | "unrecognized-character"
    | "unexpected-token"
    | "unexpected-end-of-input"
    | "unsupported-keyword"
    | "empty-load";

export interface SyntaxErrorDetail {
    readonly kind: SyntaxErrorKind;
    /** UTF-8 byte offset into the input where the offending text starts. */
    readonly offset: number;
    readonly message: string;
    readonly expected?: string;
    readonly actual?: string;
}

/**
 * Thrown by `Lexer` and `StarlarkParser`. The `tokenize` and `parse` entry points turn it into a failed result.
 */
export class StarlarkSyntaxError extends Error {
    readonly detail: SyntaxErrorDetail;

    constructor(detail: SyntaxErrorDetail) {
        super(detail.message);
        this.name = "StarlarkSyntaxError";
        this.detail = detail;
    }
}

export type Failure = { readonly ok: false; readonly error: SyntaxErrorDetail };

export type Result<T, K extends string> = ({ readonly ok: true } & { readonly [P in K]: T }) | Failure;

export function syntaxError(
    kind: SyntaxErrorKind,
    offset: number,
    message: string,
    expected?: string,
    actual?: string
): StarlarkSyntaxError {
    return new StarlarkSyntaxError({
        kind,
        offset,
        message,
        ...(expected === undefined ? {} : { expected }),
        ...(actual === undefined ? {} : { actual }),
    });
}

/**
 * Runs `fn` and converts a thrown `StarlarkSyntaxError` into a failed result. Other errors propagate.
 */
export function capture<T>(fn: () => T): { ok: true; value: T } | Failure {
    try {
        return { ok: true, value: fn() };
    } catch (e) {
        if (e instanceof StarlarkSyntaxError) {
            return { ok: false, error: e.detail };
        }
        throw e;
    }
}

/**
 * Renders `line:column: message` with 1-based line and column.
 */
export function formatSyntaxError(source: string, detail: SyntaxErrorDetail): string {
    const { line, column } = lineAndColumn(source, detail.offset);
    return `${line}:${column}: ${detail.message}`;
}

/**
 * Maps a UTF-8 byte offset to a 1-based line and a 1-based column counted in characters.
 */
export function lineAndColumn(source: string, offset: number): { line: number; column: number } {
    const before = Buffer.from(source, "utf8").subarray(0, Math.max(0, offset)).toString("utf8");
    const lines = before.split("\n");
    const current = lines[lines.length - 1] ?? "";
    return { line: lines.length, column: [...current].length + 1 };
}
