import type { NodeId, TextSpan } from "../hir/ids.js";
import type {
  CallSyntax,
  HirGenerator,
  InterpolationPart,
} from "../hir/nodes.js";
import { childByField, childrenByField, type SyntaxNode } from "../syntax/cst.js";
import type { LoweringContext } from "./context.js";
import { lowerVariableDeclaration } from "./items.js";
import {
  identifierName,
  integerLiteralValue,
  operatorFunctionName,
  stringLiteralValue,
  unescapeString,
} from "./literals.js";

export const lowerExpression = (ctx: LoweringContext, node: SyntaxNode): NodeId => {
  const span = node.span;
  // The parser already recorded the error for a recovered body.
  if (node.isError) return ctx.expression({ exprKind: "missing" }, span);
  switch (node.kind) {
    case "integer_literal":
      return ctx.expression(
        { exprKind: "literal", literal: { type: "int", value: integerLiteralValue(node.text()) } },
        span
      );
    case "float_literal":
      return ctx.expression(
        { exprKind: "literal", literal: { type: "float", value: node.text() } },
        span
      );
    case "boolean_literal":
      return ctx.expression(
        { exprKind: "literal", literal: { type: "bool", value: node.text() === "true" } },
        span
      );
    case "string_literal":
      return ctx.expression(
        { exprKind: "literal", literal: { type: "string", value: stringLiteralValue(node) } },
        span
      );
    case "string_interpolation":
      return lowerInterpolation(ctx, node);
    case "infinity":
      return ctx.expression({ exprKind: "infinity" }, span);
    case "absent":
      return ctx.expression({ exprKind: "absent" }, span);
    case "anonymous":
      return ctx.expression({ exprKind: "anonymous" }, span);
    case "identifier":
      return lowerIdentifier(ctx, node);
    case "parenthesised_expression":
      return lowerOptional(ctx, childByField(node, "expression"), span);
    case "call":
      return lowerCall(ctx, node);
    case "generator_call":
      return lowerGeneratorCall(ctx, node);
    case "infix_operator":
      return lowerInfix(ctx, node);
    case "prefix_operator":
      return lowerPrefix(ctx, node);
    case "indexed_access":
      return ctx.expression(
        {
          exprKind: "array-access",
          collection: lowerOptional(ctx, childByField(node, "collection"), span),
          indices: lowerAll(ctx, childrenByField(node, "index")),
        },
        span
      );
    case "tuple_access":
      return ctx.expression(
        {
          exprKind: "tuple-access",
          tuple: lowerOptional(ctx, childByField(node, "tuple"), span),
          field: Number(childByField(node, "field")?.text() ?? "0"),
        },
        span
      );
    case "tuple_literal":
      return ctx.expression(
        { exprKind: "tuple-literal", members: lowerAll(ctx, childrenByField(node, "member")) },
        span
      );
    case "array_literal":
      return ctx.expression(
        { exprKind: "array-literal", members: lowerAll(ctx, childrenByField(node, "member")) },
        span
      );
    case "set_literal":
      return ctx.expression(
        { exprKind: "set-literal", members: lowerAll(ctx, childrenByField(node, "member")) },
        span
      );
    case "array_literal_2d":
      return ctx.expression(
        {
          exprKind: "array-literal-2d",
          rows: childrenByField(node, "row").map((row) =>
            lowerAll(ctx, childrenByField(row, "member"))
          ),
        },
        span
      );
    case "array_comprehension":
    case "set_comprehension":
      return lowerComprehension(ctx, {
        node,
        comprehensionKind: node.kind === "array_comprehension" ? "array" : "set",
        span,
      });
    case "if_then_else":
      return lowerIfThenElse(ctx, node);
    case "let_expression":
      return lowerLet(ctx, node);
    case "annotated_expression":
      return ctx.expression(
        {
          exprKind: "annotated",
          expression: lowerOptional(ctx, childByField(node, "expression"), span),
          annotations: lowerAnnotations(ctx, node),
        },
        span
      );
    default:
      ctx.syntaxError(span, {
        kind: "unexpected-token",
        expected: "an expression",
        found: node.isError ? `'${node.text()}'` : node.kind,
      });
      return ctx.expression({ exprKind: "missing" }, span);
  }
};

const lowerOptional = (
  ctx: LoweringContext,
  node: SyntaxNode | undefined,
  span: TextSpan
): NodeId =>
  node ? lowerExpression(ctx, node) : ctx.expression({ exprKind: "missing" }, span);

const lowerAll = (ctx: LoweringContext, nodes: readonly SyntaxNode[]): NodeId[] =>
  nodes.map((node) => lowerExpression(ctx, node));

export const lowerAnnotations = (ctx: LoweringContext, node: SyntaxNode): NodeId[] =>
  lowerAll(ctx, childrenByField(node, "annotation"));

const lowerIdentifier = (ctx: LoweringContext, node: SyntaxNode): NodeId =>
  ctx.expression({ exprKind: "identifier", name: identifierName(node.text()) }, node.span);

const callee = (ctx: LoweringContext, name: string, span: TextSpan): NodeId =>
  ctx.expression({ exprKind: "identifier", name }, span);

const lowerCall = (ctx: LoweringContext, node: SyntaxNode): NodeId => {
  const target = childByField(node, "function");
  const syntax: CallSyntax = { style: "call" };
  return ctx.expression(
    {
      exprKind: "call",
      callee: lowerOptional(ctx, target, node.span),
      args: lowerAll(ctx, childrenByField(node, "argument")),
      syntax,
    },
    node.span
  );
};

/** `forall (i in S) (e)` lowers to `forall([e | i in S])` */
const lowerGeneratorCall = (ctx: LoweringContext, node: SyntaxNode): NodeId => {
  const target = lowerOptional(ctx, childByField(node, "function"), node.span);
  const comprehension = lowerComprehension(ctx, {
    node,
    comprehensionKind: "array",
    span: node.span,
  });
  const syntax: CallSyntax = { style: "generator-call" };
  return ctx.expression(
    { exprKind: "call", callee: target, args: [comprehension], syntax },
    node.span
  );
};

const lowerInfix = (ctx: LoweringContext, node: SyntaxNode): NodeId => {
  const operator = childByField(node, "operator");
  const surface = operator?.text() ?? "";
  const left = lowerOptional(ctx, childByField(node, "left"), node.span);
  const right = lowerOptional(ctx, childByField(node, "right"), node.span);
  const syntax: CallSyntax = { style: "infix", operator: surface };
  return ctx.expression(
    {
      exprKind: "call",
      callee: callee(ctx, operatorFunctionName(surface), operator?.span ?? node.span),
      args: [left, right],
      syntax,
    },
    node.span
  );
};

const lowerPrefix = (ctx: LoweringContext, node: SyntaxNode): NodeId => {
  const operator = childByField(node, "operator");
  const surface = operator?.text() ?? "";
  const operand = lowerOptional(ctx, childByField(node, "operand"), node.span);
  const syntax: CallSyntax = { style: "prefix", operator: surface };
  return ctx.expression(
    {
      exprKind: "call",
      callee: callee(ctx, operatorFunctionName(surface), operator?.span ?? node.span),
      args: [operand],
      syntax,
    },
    node.span
  );
};

const lowerComprehension = (
  ctx: LoweringContext,
  {
    node,
    comprehensionKind,
    span,
  }: { node: SyntaxNode; comprehensionKind: "array" | "set"; span: TextSpan }
): NodeId => {
  const generators = childrenByField(node, "generator").map((generator) =>
    lowerGenerator(ctx, generator)
  );
  const template = lowerOptional(ctx, childByField(node, "template"), span);
  return ctx.expression(
    { exprKind: "comprehension", comprehensionKind, template, generators },
    span
  );
};

const lowerGenerator = (ctx: LoweringContext, node: SyntaxNode): HirGenerator => {
  const whereNode = childByField(node, "where");
  if (node.kind === "assignment_generator") {
    const value = lowerOptional(ctx, childByField(node, "value"), node.span);
    const pattern = lowerPattern(ctx, childByField(node, "name"), node.span);
    const where = whereNode ? lowerExpression(ctx, whereNode) : undefined;
    return { kind: "assignment", pattern, value, where };
  }

  const collection = lowerOptional(ctx, childByField(node, "collection"), node.span);
  const patterns = childrenByField(node, "pattern").map((pattern) =>
    lowerPattern(ctx, pattern, pattern.span)
  );
  const where = whereNode ? lowerExpression(ctx, whereNode) : undefined;
  return { kind: "iterator", patterns, collection, where };
};

const lowerPattern = (
  ctx: LoweringContext,
  node: SyntaxNode | undefined,
  span: TextSpan
): NodeId => {
  if (!node || node.kind === "anonymous") {
    return ctx.pattern({ patternKind: "anonymous" }, node?.span ?? span);
  }
  const declaration = ctx.declaration(
    {
      declKind: "variable",
      origin: "generator",
      name: identifierName(node.text()),
      parameters: [],
      cases: [],
      annotations: [],
      varCapable: false,
    },
    node.span
  );
  return ctx.pattern({ patternKind: "identifier", declaration }, node.span);
};

const lowerIfThenElse = (ctx: LoweringContext, node: SyntaxNode): NodeId => {
  const conditions = childrenByField(node, "condition");
  const results = childrenByField(node, "result");
  const branches = conditions.map((condition, index) => ({
    condition: lowerExpression(ctx, condition),
    result: lowerOptional(ctx, results[index], condition.span),
  }));
  const otherwiseNode = childByField(node, "else");
  const otherwise = otherwiseNode ? lowerExpression(ctx, otherwiseNode) : undefined;
  return ctx.expression({ exprKind: "if-then-else", branches, otherwise }, node.span);
};

const lowerLet = (ctx: LoweringContext, node: SyntaxNode): NodeId => {
  const items = childrenByField(node, "item").map((item) => {
    if (item.kind === "constraint") {
      return ctx.item(
        {
          itemKind: "constraint",
          expression: lowerOptional(ctx, childByField(item, "expression"), item.span),
        },
        item.span
      );
    }
    return lowerVariableDeclaration(ctx, { node: item, origin: "let" });
  });
  const body = lowerOptional(ctx, childByField(node, "in"), node.span);
  return ctx.expression({ exprKind: "let", items, body }, node.span);
};

const lowerInterpolation = (ctx: LoweringContext, node: SyntaxNode): NodeId => {
  const parts: InterpolationPart[] = node.children.map((child) =>
    child.field === "interpolation"
      ? { expression: lowerExpression(ctx, child) }
      : { text: unescapeString(child.text()) }
  );
  return ctx.expression({ exprKind: "string-interpolation", parts }, node.span);
};
