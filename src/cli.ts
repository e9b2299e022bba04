import * as fs from "fs";
import { Command } from "commander";
import { tokenize } from "./prelyzer/Lexer.js";
import { parse } from "./prelyzer/Parser.js";
import { StarlarkGenerator } from "./generator/StarlarkGenerator.js";
import { dumpTokens } from "./types/Lexer.js";
import { type SyntaxErrorDetail, formatSyntaxError } from "./types/Errors.js";

export const ENCODING: BufferEncoding = "utf-8";

export interface DumpOptions {
    ast?: boolean;
    encoding?: BufferEncoding;
}

function readSource(inputFile: string, encoding: BufferEncoding): string | undefined {
    try {
        return fs.readFileSync(inputFile, encoding);
    } catch {
        console.error(`Error: Could not open file ${inputFile}`);
        return undefined;
    }
}

function reportFailure(source: string, error: SyntaxErrorDetail): number {
    console.error(`Error: ${formatSyntaxError(source, error)}`);
    return 1;
}

/**
 * Echoes the file, then prints its tokens (and with `ast`, the parsed program).
 * Returns the process exit code.
 */
export function runDump(inputFile: string, options: DumpOptions = {}): number {
    const content = readSource(inputFile, options.encoding ?? ENCODING);
    if (content === undefined) {
        return 1;
    }

    console.log(`Input:\n${content}\n`);

    const tokens = tokenize(content);
    if (!tokens.ok) {
        return reportFailure(content, tokens.error);
    }
    console.log(`Tokens:\n${dumpTokens(tokens.tokens)}`);

    if (options.ast) {
        const parsed = parse(content);
        if (!parsed.ok) {
            return reportFailure(content, parsed.error);
        }
        console.log(`Program:\n${new StarlarkGenerator().generate(parsed.program)}`);
    }

    return 0;
}

export function createProgram(): Command {
    const program: Command = new Command();

    program
        .name("starlark-dump")
        .description("Tokenize and parse Starlark load statements")
        .version("1.0.0")
        .argument("<input>", "path of the file to read")
        .option("-a, --ast", "also parse the file and print the program", false)
        .option("-e, --encoding <encoding>", "file encoding", ENCODING)
        .action((input: string, options: { ast: boolean; encoding: string }) => {
            const { ast, encoding } = options;
            if (!Buffer.isEncoding(encoding)) {
                program.error(`error: unknown encoding '${encoding}'`);
            }
            process.exitCode = runDump(input, { ast, encoding });
        });

    return program;
}
