import type { NodeId } from "../hir/ids.js";
import type { HirTypeBase, Inst, Optionality } from "../hir/nodes.js";
import { childByField, childrenByField, type SyntaxNode } from "../syntax/cst.js";
import type { LoweringContext } from "./context.js";
import { lowerExpression } from "./expressions.js";

type PrimitiveName = Extract<HirTypeBase, { kind: "primitive" }>["name"];

const primitiveNames: ReadonlySet<string> = new Set<PrimitiveName>([
  "bool",
  "int",
  "float",
  "string",
  "ann",
]);

const isPrimitiveName = (text: string): text is PrimitiveName =>
  primitiveNames.has(text);

const instOf = (node: SyntaxNode): Inst =>
  childByField(node, "inst")?.text() === "var" ? "var" : "par";

const optOf = (node: SyntaxNode): Optionality =>
  childByField(node, "opt") ? "opt" : "plain";

export const lowerTypeInst = (ctx: LoweringContext, node: SyntaxNode): NodeId => {
  const inst = instOf(node);
  const opt = optOf(node);
  return ctx.typeInst({ inst, opt, base: lowerTypeBase(ctx, node) }, node.span);
};

const lowerTypeBase = (ctx: LoweringContext, node: SyntaxNode): HirTypeBase => {
  switch (node.kind) {
    case "array_type": {
      const element = childByField(node, "element");
      return {
        kind: "array",
        dimensions: childrenByField(node, "dimension").map((dimension) =>
          lowerTypeInst(ctx, dimension)
        ),
        element: element ? lowerTypeInst(ctx, element) : missingTypeInst(ctx, node),
      };
    }
    case "set_type": {
      const element = childByField(node, "element");
      return {
        kind: "set",
        element: element ? lowerTypeInst(ctx, element) : missingTypeInst(ctx, node),
      };
    }
    case "tuple_type":
      return {
        kind: "tuple",
        fields: childrenByField(node, "field").map((field) => lowerTypeInst(ctx, field)),
      };
    case "type_base":
      return lowerDomain(ctx, childByField(node, "domain"));
    default:
      ctx.syntaxError(node.span, {
        kind: "unexpected-token",
        expected: "a type-inst",
        found: node.kind,
      });
      return { kind: "missing" };
  }
};

const lowerDomain = (
  ctx: LoweringContext,
  domain: SyntaxNode | undefined
): HirTypeBase => {
  if (!domain) return { kind: "missing" };
  const text = domain.text();
  switch (domain.kind) {
    case "primitive_type":
      return isPrimitiveName(text) ? { kind: "primitive", name: text } : { kind: "missing" };
    case "type_inst_id":
      return { kind: "type-var", name: text, enumVar: false };
    case "type_inst_enum_id":
      return { kind: "type-var", name: text, enumVar: true };
    default:
      return { kind: "domain", expression: lowerExpression(ctx, domain) };
  }
};

const missingTypeInst = (ctx: LoweringContext, node: SyntaxNode): NodeId =>
  ctx.typeInst({ inst: "par", opt: "plain", base: { kind: "missing" } }, node.span);

/** Whether values of this type-inst can be decision variables */
export const isVarTypeInst = (ctx: LoweringContext, id: NodeId | undefined): boolean => {
  if (id === undefined) return false;
  const node = ctx.get(id);
  if (!node || node.kind !== "type-inst") return false;
  if (node.inst === "var") return true;
  switch (node.base.kind) {
    case "array":
      return isVarTypeInst(ctx, node.base.element);
    case "tuple":
      return node.base.fields.some((field) => isVarTypeInst(ctx, field));
    default:
      return false;
  }
};
