import { CommanderError } from "commander";
import {
  readSourceFromDisk,
  type Diagnostic,
  type QueryResult,
  type ReadSource,
  type Snapshot,
} from "@tessera/compiler";
import { parseArgs, type EmitKind, type TesseraConfig } from "./config/index.js";
import { formatCliDiagnostic } from "./diagnostics.js";
import { loadModel } from "./load.js";

export type CliIo = {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  readSource: ReadSource;
};

const processIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
  readSource: readSourceFromDisk,
};

const withNewline = (text: string): string => (text.endsWith("\n") ? text : `${text}\n`);

const renderView = ({
  snapshot,
  file,
  kind,
  config,
}: {
  snapshot: Snapshot;
  file: string;
  kind: EmitKind;
  config: TesseraConfig;
}): QueryResult<string> => {
  switch (kind) {
    case "cst":
      return snapshot.getCst(file);
    case "ast":
      return snapshot.getAst(file);
    case "hir":
      return snapshot.getHir(file);
    case "prettyPrint":
      return snapshot.prettyPrint(file);
    case "scope": {
      const result = snapshot.getScope(file, config.scopeOffset ?? 0);
      if (!result.ok) return result;
      const lines = result.value.map(({ name, summary }) => `${name}\t${summary}`);
      return { ...result, value: lines.join("\n") };
    }
  }
};

/** Runs the command line and resolves to the process exit code */
export const exec = async (
  argv: readonly string[] = process.argv.slice(2),
  io: CliIo = processIo
): Promise<number> => {
  let config: TesseraConfig;
  try {
    config = parseArgs(argv, { writeOut: io.stdout, writeErr: io.stderr });
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    throw error;
  }

  const loaded = await loadModel({
    entry: config.index,
    includeDirs: config.includeDirs,
    prelude: config.prelude,
    readSource: io.readSource,
  });
  if (!loaded) {
    io.stderr(`tessera: cannot read ${config.index}\n`);
    return 1;
  }

  const snapshot = loaded.workspace.snapshot();
  const sourceOf = (file: string) => snapshot.source(file);
  const diagnostics: Diagnostic[] = [];

  for (const kind of config.emit) {
    const result = renderView({ snapshot, file: loaded.entry, kind, config });
    if (result.ok) {
      if (result.value.length > 0) io.stdout(withNewline(result.value));
    } else {
      diagnostics.push(...result.diagnostics);
    }
  }

  const checked = snapshot.diagnostics(loaded.entry);
  diagnostics.push(...(checked.ok ? checked.value : checked.diagnostics));
  diagnostics.forEach((diagnostic) =>
    io.stderr(`${formatCliDiagnostic(diagnostic, { sourceOf, color: config.color })}\n`)
  );

  return diagnostics.some((diagnostic) => diagnostic.severity === "error") ? 1 : 0;
};
