import path from "node:path";
import {
  createWorkspace,
  includeCandidates,
  readSourceFromDisk,
  type ReadSource,
  type Workspace,
} from "@tessera/compiler";

export type LoadedModel = {
  workspace: Workspace;
  entry: string;
};

/**
 * Builds a workspace holding `entry` and every file its includes reach.
 * Includes are looked up beside the including file, then in `includeDirs`.
 * Resolves to `undefined` when the entry cannot be read.
 */
export const loadModel = async ({
  entry,
  includeDirs = [],
  prelude = true,
  readSource = readSourceFromDisk,
}: {
  entry: string;
  includeDirs?: readonly string[];
  prelude?: boolean;
  readSource?: ReadSource;
}): Promise<LoadedModel | undefined> => {
  const entryPath = path.resolve(entry);
  const text = await readSource(entryPath);
  if (text === undefined) return undefined;

  const loaded = new Set<string>([entryPath]);
  const workspace = createWorkspace({
    prelude: prelude ? undefined : false,
    resolveInclude: (fromFile, includePath) =>
      includeCandidates({ fromFile, includePath, includeDirs }).find((candidate) =>
        loaded.has(candidate)
      ),
  });
  workspace.update(entryPath, text);

  const queue = [entryPath];
  const visited = new Set<string>();
  while (queue.length > 0) {
    const file = queue.shift();
    if (file === undefined || visited.has(file)) continue;
    visited.add(file);

    for (const edge of workspace.snapshot().includes(file)) {
      if (edge.target !== undefined) {
        queue.push(edge.target);
        continue;
      }
      for (const candidate of includeCandidates({ fromFile: file, includePath: edge.path, includeDirs })) {
        const source = await readSource(candidate);
        if (source === undefined) continue;
        loaded.add(candidate);
        workspace.update(candidate, source);
        queue.push(candidate);
        break;
      }
    }
  }

  return { workspace, entry: entryPath };
};
