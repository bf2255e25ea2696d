import type { NodeId } from "./ids.js";
import { getNode, type HirFragment } from "./graph.js";
import type { HirNode, HirTypeBase } from "./nodes.js";

export type WalkControl = {
  skipChildren?: boolean;
  stop?: boolean;
};

const typeBaseChildren = (base: HirTypeBase): NodeId[] => {
  switch (base.kind) {
    case "primitive":
    case "type-var":
    case "missing":
      return [];
    case "domain":
      return [base.expression];
    case "set":
      return [base.element];
    case "array":
      return [...base.dimensions, base.element];
    case "tuple":
      return [...base.fields];
  }
};

/** Owned children of a node, in source order */
export const childrenOf = (node: HirNode): NodeId[] => {
  switch (node.kind) {
    case "item":
      switch (node.itemKind) {
        case "include":
        case "error":
          return [];
        case "declaration":
          return [node.declaration];
        case "constraint":
          return [node.expression];
        case "solve":
          return [
            ...node.annotations,
            ...(node.objective === undefined ? [] : [node.objective]),
          ];
        case "output":
          return [...node.annotations, node.expression];
        case "assignment":
          return [node.target, node.value];
      }
    case "declaration":
      return [
        ...(node.returnType === undefined ? [] : [node.returnType]),
        ...(node.typeInst === undefined ? [] : [node.typeInst]),
        ...(node.aliased === undefined ? [] : [node.aliased]),
        ...node.parameters,
        ...node.cases,
        ...node.annotations,
        ...(node.body === undefined ? [] : [node.body]),
      ];
    case "type-inst":
      return typeBaseChildren(node.base);
    case "pattern":
      return node.patternKind === "identifier" ? [node.declaration] : [];
    case "expression":
      switch (node.exprKind) {
        case "literal":
        case "absent":
        case "infinity":
        case "anonymous":
        case "identifier":
        case "missing":
          return [];
        case "call":
          return [node.callee, ...node.args];
        case "set-literal":
        case "array-literal":
        case "tuple-literal":
          return [...node.members];
        case "array-literal-2d":
          return node.rows.flat();
        case "array-access":
          return [node.collection, ...node.indices];
        case "tuple-access":
          return [node.tuple];
        case "comprehension":
          return [
            ...node.generators.flatMap((generator) =>
              generator.kind === "iterator"
                ? [
                    ...generator.patterns,
                    generator.collection,
                    ...(generator.where === undefined ? [] : [generator.where]),
                  ]
                : [
                    generator.pattern,
                    generator.value,
                    ...(generator.where === undefined ? [] : [generator.where]),
                  ]
            ),
            node.template,
          ];
        case "if-then-else":
          return [
            ...node.branches.flatMap((branch) => [branch.condition, branch.result]),
            ...(node.otherwise === undefined ? [] : [node.otherwise]),
          ];
        case "let":
          return [...node.items, node.body];
        case "string-interpolation":
          return node.parts.flatMap((part) =>
            "expression" in part ? [part.expression] : []
          );
        case "annotated":
          return [node.expression, ...node.annotations];
      }
  }
};

/**
 * Pre-order walk. `enter` may skip a subtree or stop the walk; `exit` runs
 * after a node's children.
 */
export const walkHir = ({
  fragment,
  roots = fragment.roots,
  enter,
  exit,
}: {
  fragment: HirFragment;
  roots?: readonly NodeId[];
  enter?: (node: HirNode) => WalkControl | void;
  exit?: (node: HirNode) => void;
}): void => {
  let stopped = false;
  const visit = (id: NodeId): void => {
    if (stopped) return;
    const node = getNode(fragment, id);
    const control = enter?.(node);
    if (control?.stop) {
      stopped = true;
      return;
    }
    if (!control?.skipChildren) {
      childrenOf(node).forEach(visit);
    }
    if (!stopped) exit?.(node);
  };
  roots.forEach(visit);
};
