import type { Resolution } from "../resolution/types.js";
import { getNode, type HirFragment } from "./graph.js";
import type { NodeId } from "./ids.js";
import type { HirNode, HirTypeBase } from "./nodes.js";
import { printName } from "./print.js";
import { childrenOf } from "./walk.js";

export type HirDumpOptions = {
  /** Append `#id` to every node */
  ids?: boolean;
  /** Adds `-> decl#id` (or the failing code) to identifier uses and calls */
  resolutionOf?: (id: NodeId) => Resolution | undefined;
};

const describeTypeBase = (base: HirTypeBase): string => {
  switch (base.kind) {
    case "primitive":
    case "type-var":
      return base.name;
    default:
      return base.kind;
  }
};

const nodeLabel = (fragment: HirFragment, node: HirNode): string => {
  switch (node.kind) {
    case "item":
      switch (node.itemKind) {
        case "include":
          return `Include ${JSON.stringify(node.path)}`;
        case "solve":
          return `Solve ${node.goal}`;
        case "error":
          return `ErrorItem ${JSON.stringify(node.text)}`;
        default:
          return `Item ${node.itemKind}`;
      }
    case "declaration": {
      const origin = node.origin === "item" ? "" : ` (${node.origin})`;
      const capability = node.varCapable ? " var-capable" : "";
      return `Declaration ${node.declKind} ${printName(node.name ?? "_")}${origin}${capability}`;
    }
    case "type-inst":
      return `TypeInst ${node.inst}${node.opt === "opt" ? " opt" : ""} ${describeTypeBase(node.base)}`;
    case "pattern":
      return `Pattern ${node.patternKind}`;
    case "expression":
      switch (node.exprKind) {
        case "literal":
          return `Literal ${node.literal.type} ${JSON.stringify(node.literal.value)}`;
        case "identifier":
          return `Identifier ${printName(node.name)}`;
        case "call": {
          const callee = getNode(fragment, node.callee);
          const name =
            callee.kind === "expression" && callee.exprKind === "identifier"
              ? printName(callee.name)
              : "?";
          return `Call ${name} (${node.syntax.style})`;
        }
        case "comprehension":
          return `Comprehension ${node.comprehensionKind}`;
        case "tuple-access":
          return `TupleAccess .${node.field}`;
        default:
          return node.exprKind
            .split("-")
            .map((part) => `${part.charAt(0).toUpperCase()}${part.slice(1)}`)
            .join("");
      }
  }
};

const resolutionSuffix = (resolution: Resolution | undefined): string => {
  if (!resolution) return "";
  if (resolution.failure) return ` -> !${resolution.failure.code}`;
  return resolution.chosen === undefined ? "" : ` -> decl#${resolution.chosen}`;
};

/**
 * Indented tree dump of a fragment. Without options it shows structure
 * only; `ids` and `resolutionOf` add identity and binding information.
 */
export const dumpHir = (
  fragment: HirFragment,
  { ids = false, resolutionOf }: HirDumpOptions = {}
): string => {
  const lines: string[] = [];
  const visit = (id: NodeId, depth: number): void => {
    const node = getNode(fragment, id);
    const identity = ids ? ` #${node.id}` : "";
    const resolved = resolutionSuffix(resolutionOf?.(node.id));
    lines.push(`${"  ".repeat(depth)}${nodeLabel(fragment, node)}${identity}${resolved}`);
    childrenOf(node).forEach((child) => visit(child, depth + 1));
  };
  fragment.roots.forEach((root) => visit(root, 0));
  return lines.join("\n");
};
