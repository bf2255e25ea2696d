import { fingerprint } from "@tessera/lib";
import { topLevelDeclarations } from "../hir/graph.js";
import type { FileId, NodeId, TextSpan } from "../hir/ids.js";
import type { NodeIdAllocator } from "../lowering/identity.js";
import { lowerFile, type LoweredFile } from "../lowering/lowering.js";
import { resolveIncludes, type FileIncludes, type IncludeResolver } from "../scope/includes.js";
import { buildLexicalScopes, type FileScopes } from "../scope/lexical-scopes.js";
import { signatureFingerprint } from "../scope/signature.js";
import type { SyntaxTree } from "../syntax/cst.js";
import { parse } from "../syntax/parser.js";

export type TopLevelEntry = {
  name: string;
  signature: string;
  span: TextSpan;
};

/** Everything derived from one version of one file */
export interface FileRecord {
  file: FileId;
  version: number;
  text: string;
  tree: SyntaxTree;
  lowered: LoweredFile;
  scopes: FileScopes;
  /** Signature fingerprint of every declaration, local ones included */
  signatures: ReadonlyMap<NodeId, string>;
  topLevel: ReadonlyMap<NodeId, TopLevelEntry>;
  /** Lexical scope owner to a fingerprint of its kind, parent and bindings */
  scopeKeys: ReadonlyMap<string, string>;
  includes: FileIncludes;
}

const scopeFingerprints = (
  scopes: FileScopes,
  signatures: ReadonlyMap<NodeId, string>
): Map<string, string> => {
  const keys = new Map<string, string>();
  scopes.arena.all().forEach((scope) => {
    const info = scopes.arena.info(scope);
    const parent = info.parent ? scopes.arena.info(info.parent).owner : "";
    keys.set(
      info.owner,
      fingerprint([
        info.kind,
        parent,
        ...scopes.arena.locals(scope).flatMap((id) => [id, signatures.get(id) ?? ""]),
      ])
    );
  });
  return keys;
};

export const buildFileRecord = ({
  file,
  version,
  text,
  allocator,
  previous,
  resolveInclude,
  isKnown,
}: {
  file: FileId;
  version: number;
  text: string;
  allocator: NodeIdAllocator;
  previous?: FileRecord;
  resolveInclude: IncludeResolver;
  isKnown: (file: FileId) => boolean;
}): FileRecord => {
  const tree = parse(text, file);
  const lowered = lowerFile({ file, tree, allocator, previous: previous?.lowered.identities });
  const fragment = lowered.fragment;
  const scopes = buildLexicalScopes(fragment);

  const signatures = new Map<NodeId, string>();
  fragment.nodes.forEach((node) => {
    if (node.kind === "declaration") {
      signatures.set(node.id, signatureFingerprint(fragment, node));
    }
  });

  const topLevel = new Map<NodeId, TopLevelEntry>();
  topLevelDeclarations(fragment).forEach((declaration) => {
    if (declaration.name === undefined) return;
    topLevel.set(declaration.id, {
      name: declaration.name,
      signature: signatures.get(declaration.id) ?? "",
      span: declaration.span,
    });
  });

  return {
    file,
    version,
    text,
    tree,
    lowered,
    scopes,
    signatures,
    topLevel,
    scopeKeys: scopeFingerprints(scopes, signatures),
    includes: resolveIncludes({ fragment, resolveInclude, isKnown }),
  };
};

/** Same record with its include edges resolved against a new file set */
export const withResolvedIncludes = (
  record: FileRecord,
  resolveInclude: IncludeResolver,
  isKnown: (file: FileId) => boolean
): FileRecord => ({
  ...record,
  includes: resolveIncludes({ fragment: record.lowered.fragment, resolveInclude, isKnown }),
});
