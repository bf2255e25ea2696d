import { fingerprint } from "@tessera/lib";
import { getDeclaration, type HirFragment } from "../hir/graph.js";
import type { NodeId } from "../hir/ids.js";
import type { HirDeclaration } from "../hir/nodes.js";
import { printName, printTypeInst } from "../hir/print.js";

const typeInstText = (fragment: HirFragment, id: NodeId | undefined): string =>
  id === undefined ? "_" : printTypeInst(fragment, id);

/** `(int, var float)`: parameter type-insts only */
export const parameterSignature = (
  fragment: HirFragment,
  declaration: HirDeclaration
): string =>
  `(${declaration.parameters
    .map((id) => typeInstText(fragment, getDeclaration(fragment, id).typeInst))
    .join(", ")})`;

/** Human readable signature, used in diagnostics and scope listings */
export const declarationSummary = (
  fragment: HirFragment,
  declaration: HirDeclaration
): string => {
  const name = printName(declaration.name ?? "_");
  switch (declaration.declKind) {
    case "function":
      return `function ${typeInstText(fragment, declaration.returnType)}: ${name}${parameterSignature(fragment, declaration)}`;
    case "predicate":
    case "test":
      return `${declaration.declKind} ${name}${parameterSignature(fragment, declaration)}`;
    case "annotation":
      return `annotation ${name}${declaration.parameters.length > 0 ? parameterSignature(fragment, declaration) : ""}`;
    case "variable":
      return `${typeInstText(fragment, declaration.typeInst)}: ${name}`;
    case "type-alias":
      return `type ${name} = ${typeInstText(fragment, declaration.aliased)}`;
    case "enum":
      return `enum ${name}`;
  }
};

/**
 * Everything about a declaration that name resolution can observe. Bodies
 * only count by presence.
 */
export const signatureFingerprint = (
  fragment: HirFragment,
  declaration: HirDeclaration
): string =>
  fingerprint([
    declaration.declKind,
    declaration.origin,
    declaration.name ?? "",
    declarationSummary(fragment, declaration),
    declaration.varCapable,
    declaration.body !== undefined,
    declaration.cases
      .map((id) => getDeclaration(fragment, id).name ?? "")
      .join(","),
  ]);
