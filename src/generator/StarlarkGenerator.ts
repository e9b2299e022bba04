import type { LoadStmt, LoadSymbol, Program, Statement } from "../types/AST.js";

/**
 * Turns a parsed `Program` back into source text, one statement per line.
 */
export class StarlarkGenerator {
    /**
     * A symbol imported under its own name is written as a bare string, otherwise as `local = "exported"`.
     */
    private formatSymbol(symbol: LoadSymbol): string {
        if (symbol.localName === symbol.exportedName) {
            return `"${symbol.exportedName}"`;
        }
        return `${symbol.localName} = "${symbol.exportedName}"`;
    }

    private formatLoad(stmt: LoadStmt): string {
        const args = [`"${stmt.moduleName}"`, ...stmt.symbols.map((symbol) => this.formatSymbol(symbol))];
        return `load(${args.join(", ")})`;
    }

    private formatStatement(stmt: Statement): string {
        switch (stmt.type) {
            case "Load":
                return this.formatLoad(stmt);
        }
    }

    generate(program: Program): string {
        return program.statements.map((stmt) => this.formatStatement(stmt) + "\n").join("");
    }
}
