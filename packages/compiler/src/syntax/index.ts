export * from "./cst.js";
export { Parser, parse } from "./parser.js";
export { Lexer, tokenize } from "./lexer.js";
export { Token, type TokenKind } from "./token.js";
