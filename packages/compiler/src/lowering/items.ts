import type { NodeId, TextSpan } from "../hir/ids.js";
import type { DeclKind, DeclOrigin, HirDeclarationData } from "../hir/nodes.js";
import { childByField, childrenByField, type SyntaxNode } from "../syntax/cst.js";
import type { LoweringContext } from "./context.js";
import { lowerAnnotations, lowerExpression } from "./expressions.js";
import { identifierName, stringLiteralValue } from "./literals.js";
import { isVarTypeInst, lowerTypeInst } from "./type-insts.js";

const nameOf = (node: SyntaxNode): string => {
  const name = childByField(node, "name");
  return name ? identifierName(name.text()) : "";
};

const lowerOptionalExpression = (
  ctx: LoweringContext,
  node: SyntaxNode | undefined
): NodeId | undefined => (node ? lowerExpression(ctx, node) : undefined);

const requiredExpression = (
  ctx: LoweringContext,
  node: SyntaxNode | undefined,
  span: TextSpan
): NodeId => lowerOptionalExpression(ctx, node) ?? ctx.expression({ exprKind: "missing" }, span);

const declarationData = (
  data: Pick<HirDeclarationData, "declKind" | "origin" | "varCapable"> &
    Partial<HirDeclarationData>
): HirDeclarationData => ({
  parameters: [],
  cases: [],
  annotations: [],
  ...data,
});

/** `ti: name :: ann = e`, used by top-level items and let items */
export const lowerVariableDeclaration = (
  ctx: LoweringContext,
  {
    node,
    origin,
    identity,
  }: { node: SyntaxNode; origin: DeclOrigin; identity?: string }
): NodeId => {
  const typeNode = childByField(node, "type");
  const typeInst = typeNode ? lowerTypeInst(ctx, typeNode) : undefined;
  const annotations = lowerAnnotations(ctx, node);
  const body = lowerOptionalExpression(ctx, childByField(node, "definition"));
  return ctx.declaration(
    declarationData({
      declKind: "variable",
      origin,
      name: nameOf(node),
      typeInst,
      annotations,
      body,
      varCapable: isVarTypeInst(ctx, typeInst),
    }),
    node.span,
    identity
  );
};

const lowerParameters = (ctx: LoweringContext, node: SyntaxNode): NodeId[] =>
  childrenByField(node, "parameter").map((parameter) => {
    const typeNode = childByField(parameter, "type");
    const typeInst = typeNode ? lowerTypeInst(ctx, typeNode) : undefined;
    const name = childByField(parameter, "name");
    return ctx.declaration(
      declarationData({
        declKind: "variable",
        origin: "parameter",
        name: name ? identifierName(name.text()) : undefined,
        typeInst,
        annotations: lowerAnnotations(ctx, parameter),
        varCapable: isVarTypeInst(ctx, typeInst),
      }),
      parameter.span
    );
  });

/** Wraps a top-level declaration in its item, keyed by declaration identity */
const declarationItem = (
  ctx: LoweringContext,
  {
    node,
    declKind,
    build,
  }: {
    node: SyntaxNode;
    declKind: DeclKind;
    build: (identity: string) => NodeId;
  }
): NodeId => {
  const identity = ctx.nextDeclarationIdentity(declKind, nameOf(node));
  const declaration = build(identity.declaration);
  return ctx.item({ itemKind: "declaration", declaration }, node.span, identity.item);
};

const lowerCallable = (
  ctx: LoweringContext,
  node: SyntaxNode,
  declKind: Extract<DeclKind, "function" | "predicate" | "test" | "annotation">
): NodeId =>
  declarationItem(ctx, {
    node,
    declKind,
    build: (identity) => {
      const returnNode = childByField(node, "return_type");
      const returnType = returnNode ? lowerTypeInst(ctx, returnNode) : undefined;
      const parameters = lowerParameters(ctx, node);
      const annotations = lowerAnnotations(ctx, node);
      const body = lowerOptionalExpression(ctx, childByField(node, "body"));
      const varCapable =
        declKind === "predicate" ||
        (declKind === "function" && isVarTypeInst(ctx, returnType));
      return ctx.declaration(
        declarationData({
          declKind,
          origin: "item",
          name: nameOf(node),
          parameters,
          returnType,
          annotations,
          body,
          varCapable,
        }),
        node.span,
        identity
      );
    },
  });

const lowerEnum = (ctx: LoweringContext, node: SyntaxNode): NodeId =>
  declarationItem(ctx, {
    node,
    declKind: "enum",
    build: (identity) => {
      const name = nameOf(node);
      const annotations = lowerAnnotations(ctx, node);
      const casesNode = childByField(node, "cases");
      const cases = casesNode
        ? childrenByField(casesNode, "case").map((caseNode) => {
            const enumName = ctx.expression(
              { exprKind: "identifier", name },
              caseNode.span
            );
            const typeInst = ctx.typeInst(
              { inst: "par", opt: "plain", base: { kind: "domain", expression: enumName } },
              caseNode.span
            );
            return ctx.declaration(
              declarationData({
                declKind: "variable",
                origin: "enum-case",
                name: identifierName(caseNode.text()),
                typeInst,
                varCapable: false,
              }),
              caseNode.span
            );
          })
        : [];
      const body = lowerOptionalExpression(ctx, childByField(node, "definition"));
      return ctx.declaration(
        declarationData({
          declKind: "enum",
          origin: "item",
          name,
          cases,
          annotations,
          body,
          varCapable: false,
        }),
        node.span,
        identity
      );
    },
  });

const lowerTypeAlias = (ctx: LoweringContext, node: SyntaxNode): NodeId =>
  declarationItem(ctx, {
    node,
    declKind: "type-alias",
    build: (identity) => {
      const annotations = lowerAnnotations(ctx, node);
      const typeNode = childByField(node, "type");
      const aliased = typeNode ? lowerTypeInst(ctx, typeNode) : undefined;
      return ctx.declaration(
        declarationData({
          declKind: "type-alias",
          origin: "item",
          name: nameOf(node),
          aliased,
          annotations,
          varCapable: isVarTypeInst(ctx, aliased),
        }),
        node.span,
        identity
      );
    },
  });

const lowerSolve = (ctx: LoweringContext, node: SyntaxNode): NodeId => {
  const goalText = childByField(node, "goal")?.text();
  const goal =
    goalText === "minimize" || goalText === "maximize" ? goalText : "satisfy";
  const annotations = lowerAnnotations(ctx, node);
  const objective = lowerOptionalExpression(ctx, childByField(node, "objective"));
  return ctx.item({ itemKind: "solve", goal, objective, annotations }, node.span);
};

/**
 * Lowers one top-level CST item. `error` is the syntax error record the
 * parser reported for an ERROR node.
 */
export const lowerItem = (
  ctx: LoweringContext,
  node: SyntaxNode,
  error?: { message: string }
): NodeId => {
  const span = node.span;
  switch (node.kind) {
    case "include": {
      const file = childByField(node, "file");
      return ctx.item(
        { itemKind: "include", path: file ? stringLiteralValue(file) : "" },
        span
      );
    }
    case "declaration":
      return declarationItem(ctx, {
        node,
        declKind: "variable",
        build: (identity) =>
          lowerVariableDeclaration(ctx, { node, origin: "item", identity }),
      });
    case "assignment": {
      const name = childByField(node, "name");
      const target = name
        ? ctx.expression(
            { exprKind: "identifier", name: identifierName(name.text()) },
            name.span
          )
        : ctx.expression({ exprKind: "missing" }, span);
      const value = requiredExpression(ctx, childByField(node, "definition"), span);
      return ctx.item({ itemKind: "assignment", target, value }, span);
    }
    case "constraint":
      return ctx.item(
        {
          itemKind: "constraint",
          expression: requiredExpression(ctx, childByField(node, "expression"), span),
        },
        span
      );
    case "solve":
      return lowerSolve(ctx, node);
    case "output": {
      const annotations = lowerAnnotations(ctx, node);
      const expression = requiredExpression(ctx, childByField(node, "expression"), span);
      return ctx.item({ itemKind: "output", expression, annotations }, span);
    }
    case "function_item":
      return lowerCallable(ctx, node, "function");
    case "predicate":
      return lowerCallable(ctx, node, "predicate");
    case "test":
      return lowerCallable(ctx, node, "test");
    case "annotation_item":
      return lowerCallable(ctx, node, "annotation");
    case "enumeration":
      return lowerEnum(ctx, node);
    case "type_alias":
      return lowerTypeAlias(ctx, node);
    default: {
      const message = error?.message ?? `unexpected ${node.kind}`;
      if (!error) {
        ctx.syntaxError(span, {
          kind: "unexpected-token",
          expected: "an item",
          found: node.isError ? `'${node.text()}'` : node.kind,
        });
      }
      return ctx.item({ itemKind: "error", message, text: node.text() }, span);
    }
  }
};
