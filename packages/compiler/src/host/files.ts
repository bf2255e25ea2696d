import path from "node:path";
import { readFile } from "node:fs/promises";

/** Reads a model file; `undefined` when there is no such file */
export type ReadSource = (filePath: string) => Promise<string | undefined>;

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error &&
  "code" in error &&
  (error.code === "ENOENT" || error.code === "EISDIR" || error.code === "ENOTDIR");

export const readSourceFromDisk: ReadSource = async (filePath) => {
  try {
    return await readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFile(error)) return undefined;
    throw error;
  }
};

/**
 * Files `include "includePath"` in `fromFile` may name, in lookup order:
 * beside the including file, then each include directory.
 */
export const includeCandidates = ({
  fromFile,
  includePath,
  includeDirs,
}: {
  fromFile: string;
  includePath: string;
  includeDirs: readonly string[];
}): string[] => {
  if (path.isAbsolute(includePath)) return [path.resolve(includePath)];
  return Array.from(
    new Set([
      path.resolve(path.dirname(fromFile), includePath),
      ...includeDirs.map((dir) => path.resolve(dir, includePath)),
    ])
  );
};
