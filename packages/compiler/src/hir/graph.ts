import type { FileId, NodeId } from "./ids.js";
import type {
  HirDeclaration,
  HirExpression,
  HirItem,
  HirNode,
  HirPattern,
  HirTypeInst,
} from "./nodes.js";

/** Lowered HIR of one file version */
export interface HirFragment {
  file: FileId;
  /** Top-level items in source order */
  roots: readonly NodeId[];
  nodes: ReadonlyMap<NodeId, HirNode>;
  /** Owning parent of every non-root node */
  parents: ReadonlyMap<NodeId, NodeId>;
}

export const getNode = (fragment: HirFragment, id: NodeId): HirNode => {
  const node = fragment.nodes.get(id);
  if (!node) {
    throw new Error(`missing HirNode ${id} in ${fragment.file}`);
  }
  return node;
};

export const getExpression = (fragment: HirFragment, id: NodeId): HirExpression => {
  const node = getNode(fragment, id);
  if (node.kind !== "expression") {
    throw new Error(`HirNode ${id} is a ${node.kind}, expected an expression`);
  }
  return node;
};

export const getDeclaration = (fragment: HirFragment, id: NodeId): HirDeclaration => {
  const node = getNode(fragment, id);
  if (node.kind !== "declaration") {
    throw new Error(`HirNode ${id} is a ${node.kind}, expected a declaration`);
  }
  return node;
};

export const getTypeInst = (fragment: HirFragment, id: NodeId): HirTypeInst => {
  const node = getNode(fragment, id);
  if (node.kind !== "type-inst") {
    throw new Error(`HirNode ${id} is a ${node.kind}, expected a type-inst`);
  }
  return node;
};

export const getItem = (fragment: HirFragment, id: NodeId): HirItem => {
  const node = getNode(fragment, id);
  if (node.kind !== "item") {
    throw new Error(`HirNode ${id} is a ${node.kind}, expected an item`);
  }
  return node;
};

export const getPattern = (fragment: HirFragment, id: NodeId): HirPattern => {
  const node = getNode(fragment, id);
  if (node.kind !== "pattern") {
    throw new Error(`HirNode ${id} is a ${node.kind}, expected a pattern`);
  }
  return node;
};

/** Declarations introduced by the file's top-level items, in source order */
export const topLevelDeclarations = (fragment: HirFragment): HirDeclaration[] => {
  const declarations: HirDeclaration[] = [];
  fragment.roots.forEach((root) => {
    const item = getItem(fragment, root);
    if (item.itemKind !== "declaration") return;
    const declaration = getDeclaration(fragment, item.declaration);
    declarations.push(declaration);
    declaration.cases.forEach((id) => declarations.push(getDeclaration(fragment, id)));
  });
  return declarations;
};
