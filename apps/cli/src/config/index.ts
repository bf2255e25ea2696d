export { createProgram, parseArgs, type CliOutput } from "./arg-parser.js";
export type { EmitKind, TesseraConfig } from "./types.js";
