import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import type { EmitKind, TesseraConfig } from "./types.js";

const require = createRequire(import.meta.url);

const readVersion = (): string => {
  const manifest: unknown = require("../../package.json");
  return typeof manifest === "object" &&
    manifest !== null &&
    "version" in manifest &&
    typeof manifest.version === "string"
    ? manifest.version
    : "0.0.0";
};

type CliOptions = {
  emitCst?: boolean;
  emitAst?: boolean;
  emitHir?: boolean;
  emitScope?: number;
  prettyPrint?: boolean;
  includeDir: string[];
  prelude: boolean;
  color: boolean;
};

export type CliOutput = {
  writeOut: (text: string) => void;
  writeErr: (text: string) => void;
};

const appendOptionValue = (value: string, previous: string[]): string[] => [
  ...previous,
  value,
];

const parseOffset = (value: string): number => {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("expected a non-negative integer offset");
  }
  return Number(value);
};

export const createProgram = (output?: CliOutput): Command => {
  const program = new Command()
    .name("tessera")
    .description("Inspect and check constraint models")
    .version(readVersion(), "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command")
    .argument("<file>", "entry model file")
    .option("--emit-cst", "print the concrete syntax tree")
    .option("--emit-ast", "print the lowered tree")
    .option("--emit-hir", "print the lowered tree with ids and resolutions")
    .option("--emit-scope <offset>", "print the names visible at a byte offset", parseOffset)
    .option("--pretty-print", "print the model in canonical form")
    .option(
      "--include-dir <dir>",
      "additional include directory (repeatable)",
      appendOptionValue,
      [],
    )
    .option("--no-prelude", "do not load the builtin declarations")
    .option("--no-color", "disable ANSI colours in diagnostics");

  if (output) {
    program.exitOverride().configureOutput(output);
  }
  return program;
};

const emitKinds = (opts: CliOptions): EmitKind[] => {
  const requested: [EmitKind, boolean][] = [
    ["cst", opts.emitCst === true],
    ["ast", opts.emitAst === true],
    ["hir", opts.emitHir === true],
    ["scope", opts.emitScope !== undefined],
    ["prettyPrint", opts.prettyPrint === true],
  ];
  return requested.filter(([, enabled]) => enabled).map(([kind]) => kind);
};

/** Throws a `CommanderError` for bad arguments, help and version when `output` is given */
export const parseArgs = (argv: readonly string[], output?: CliOutput): TesseraConfig => {
  const program = createProgram(output);
  program.parse(["node", "tessera", ...argv]);
  const opts = program.opts<CliOptions>();
  const [index = ""] = program.args;

  return {
    index,
    emit: emitKinds(opts),
    scopeOffset: opts.emitScope,
    includeDirs: opts.includeDir,
    prelude: opts.prelude,
    color: opts.color,
  };
};
