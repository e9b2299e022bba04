// --- AST types ---

/**
 * One imported binding. `localName` is bound in the importing file,
 * `exportedName` is the name the loaded module publishes.
 */
export interface LoadSymbol {
    readonly localName: string;
    readonly exportedName: string;
}

// load("@rules_cc//cc:defs.bzl", "cc_library", test = "cc_test")
export interface LoadStmt {
    readonly type: "Load";
    readonly moduleName: string;
    // never empty
    readonly symbols: readonly LoadSymbol[];
}

export type Statement = LoadStmt;

export interface Program {
    readonly type: "Program";
    readonly statements: readonly Statement[];
}

export function loadStmt(moduleName: string, symbols: readonly LoadSymbol[]): LoadStmt {
    return Object.freeze({
        type: "Load" as const,
        moduleName,
        symbols: Object.freeze(symbols.map((symbol) => Object.freeze({ ...symbol }))),
    });
}

export function program(statements: readonly Statement[]): Program {
    return Object.freeze({ type: "Program" as const, statements: Object.freeze([...statements]) });
}
