import { readFileSync } from "node:fs";

/** File id the prelude is registered under */
export const PRELUDE_FILE = "tessera:builtins.mzn";

let cached: string | undefined;

/** Declarations every model sees without including anything */
export const preludeText = (): string => {
  cached ??= readFileSync(new URL("./builtins.mzn", import.meta.url), "utf8");
  return cached;
};
