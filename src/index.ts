export { Lexer, tokenize, type TokenizeResult } from "./prelyzer/Lexer.js";
export { StarlarkParser, parse, type ParseResult } from "./prelyzer/Parser.js";
export { PUNCTUATOR_RULES, KEYWORDS, type PunctuatorRule } from "./prelyzer/Rules.js";
export { StarlarkGenerator } from "./generator/StarlarkGenerator.js";
export * from "./types/Lexer.js";
export * from "./types/AST.js";
export * from "./types/Errors.js";
