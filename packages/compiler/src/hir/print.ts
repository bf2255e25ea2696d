import { escapeString } from "../lowering/literals.js";
import { BACKTICK_PRECEDENCE, binaryOperators, keywords } from "../syntax/grammar.js";
import {
  getDeclaration,
  getExpression,
  getItem,
  getNode,
  getPattern,
  getTypeInst,
  type HirFragment,
} from "./graph.js";
import type { NodeId } from "./ids.js";
import type { HirDeclaration, HirExpression, HirGenerator, HirItem } from "./nodes.js";

/** Canonical source text for HIR: one item per line, operators infix */

const PLAIN_IDENTIFIER = /^[A-Za-z][A-Za-z0-9_]*$/;

export const printName = (name: string): string =>
  PLAIN_IDENTIFIER.test(name) && !keywords.has(name) ? name : `'${name}'`;

const infixPrecedence = (operator: string): number =>
  operator.startsWith("`")
    ? BACKTICK_PRECEDENCE
    : (binaryOperators.get(operator)?.precedence ?? BACKTICK_PRECEDENCE);

const infixOperatorOf = (expression: HirExpression): string | undefined =>
  expression.exprKind === "call" && expression.syntax.style === "infix"
    ? expression.syntax.operator
    : undefined;

const list = (fragment: HirFragment, ids: readonly NodeId[]): string =>
  ids.map((id) => printExpression(fragment, id)).join(", ");

const annotationSuffix = (fragment: HirFragment, ids: readonly NodeId[]): string =>
  ids.map((id) => ` :: ${printExpression(fragment, id)}`).join("");

export const printExpression = (fragment: HirFragment, id: NodeId): string => {
  const expression = getExpression(fragment, id);
  switch (expression.exprKind) {
    case "literal": {
      const literal = expression.literal;
      switch (literal.type) {
        case "int":
        case "float":
          return literal.value;
        case "bool":
          return literal.value ? "true" : "false";
        case "string":
          return `"${escapeString(literal.value)}"`;
      }
    }
    case "absent":
      return "<>";
    case "infinity":
      return "infinity";
    case "anonymous":
      return "_";
    case "identifier":
      return printName(expression.name);
    case "missing":
      return "<missing>";
    case "call":
      return printCall(fragment, expression);
    case "set-literal":
      return `{${list(fragment, expression.members)}}`;
    case "array-literal":
      return `[${list(fragment, expression.members)}]`;
    case "array-literal-2d":
      return `[| ${expression.rows.map((row) => list(fragment, row)).join(" | ")} |]`;
    case "tuple-literal":
      return expression.members.length === 1
        ? `(${list(fragment, expression.members)},)`
        : `(${list(fragment, expression.members)})`;
    case "array-access":
      return `${printOperand(fragment, expression.collection)}[${list(fragment, expression.indices)}]`;
    case "tuple-access":
      return `${printOperand(fragment, expression.tuple)}.${expression.field}`;
    case "comprehension": {
      const body = `${printExpression(fragment, expression.template)} | ${printGenerators(fragment, expression.generators)}`;
      return expression.comprehensionKind === "array" ? `[${body}]` : `{${body}}`;
    }
    case "if-then-else": {
      const [first, ...rest] = expression.branches;
      const parts = first
        ? [`if ${printExpression(fragment, first.condition)} then ${printExpression(fragment, first.result)}`]
        : [];
      rest.forEach((branch) =>
        parts.push(
          `elseif ${printExpression(fragment, branch.condition)} then ${printExpression(fragment, branch.result)}`
        )
      );
      if (expression.otherwise !== undefined) {
        parts.push(`else ${printExpression(fragment, expression.otherwise)}`);
      }
      parts.push("endif");
      return parts.join(" ");
    }
    case "let": {
      const items = expression.items.map((item) => {
        const node = getNode(fragment, item);
        return node.kind === "declaration"
          ? printDeclaration(fragment, node)
          : printItem(fragment, getItem(fragment, item));
      });
      return `let { ${items.join("; ")} } in ${printExpression(fragment, expression.body)}`;
    }
    case "string-interpolation":
      return `"${expression.parts
        .map((part) =>
          "text" in part
            ? escapeString(part.text)
            : `\\(${printExpression(fragment, part.expression)})`
        )
        .join("")}"`;
    case "annotated":
      return `${printExpression(fragment, expression.expression)}${annotationSuffix(fragment, expression.annotations)}`;
  }
};

/** Postfix operands need parentheses around operator calls */
const printOperand = (fragment: HirFragment, id: NodeId): string => {
  const expression = getExpression(fragment, id);
  const text = printExpression(fragment, id);
  if (expression.exprKind === "call" && expression.syntax.style !== "call") {
    return expression.syntax.style === "generator-call" ? text : `(${text})`;
  }
  return expression.exprKind === "annotated" ? `(${text})` : text;
};

const calleeName = (fragment: HirFragment, id: NodeId): string => {
  const callee = getExpression(fragment, id);
  return callee.exprKind === "identifier" ? callee.name : printExpression(fragment, id);
};

const printCall = (
  fragment: HirFragment,
  call: Extract<HirExpression, { exprKind: "call" }>
): string => {
  const syntax = call.syntax;
  switch (syntax.style) {
    case "call":
      return `${printName(calleeName(fragment, call.callee))}(${list(fragment, call.args)})`;
    case "prefix": {
      const operand = call.args[0];
      const text = operand === undefined ? "<missing>" : printOperand(fragment, operand);
      return /^[a-z]/.test(syntax.operator)
        ? `${syntax.operator} ${text}`
        : `${syntax.operator}${text}`;
    }
    case "infix": {
      const [left, right] = call.args;
      const precedence = infixPrecedence(syntax.operator);
      const side = (id: NodeId | undefined, isRight: boolean): string => {
        if (id === undefined) return "<missing>";
        const text = printExpression(fragment, id);
        const child = getExpression(fragment, id);
        const childOperator = infixOperatorOf(child);
        if (child.exprKind === "annotated") return `(${text})`;
        if (childOperator === undefined) return text;
        const childPrecedence = infixPrecedence(childOperator);
        const associativity = binaryOperators.get(syntax.operator)?.associativity ?? "left";
        const keepsSide = isRight
          ? associativity === "right"
          : associativity === "left";
        return childPrecedence < precedence ||
          (childPrecedence === precedence && keepsSide)
          ? text
          : `(${text})`;
      };
      return `${side(left, false)} ${syntax.operator} ${side(right, true)}`;
    }
    case "generator-call": {
      const comprehension = call.args[0];
      const node = comprehension === undefined ? undefined : getExpression(fragment, comprehension);
      if (node?.exprKind !== "comprehension") {
        return `${printName(calleeName(fragment, call.callee))}(${list(fragment, call.args)})`;
      }
      return `${printName(calleeName(fragment, call.callee))} (${printGenerators(fragment, node.generators)}) (${printExpression(fragment, node.template)})`;
    }
  }
};

const printPattern = (fragment: HirFragment, id: NodeId): string => {
  const pattern = getPattern(fragment, id);
  if (pattern.patternKind === "anonymous") return "_";
  return printName(getDeclaration(fragment, pattern.declaration).name ?? "_");
};

const printGenerators = (
  fragment: HirFragment,
  generators: readonly HirGenerator[]
): string =>
  generators
    .map((generator) => {
      const where =
        generator.where === undefined
          ? ""
          : ` where ${printExpression(fragment, generator.where)}`;
      if (generator.kind === "assignment") {
        return `${printPattern(fragment, generator.pattern)} = ${printExpression(fragment, generator.value)}${where}`;
      }
      const patterns = generator.patterns.map((id) => printPattern(fragment, id)).join(", ");
      return `${patterns} in ${printExpression(fragment, generator.collection)}${where}`;
    })
    .join(", ");

export const printTypeInst = (fragment: HirFragment, id: NodeId): string => {
  const typeInst = getTypeInst(fragment, id);
  const prefix = `${typeInst.inst === "var" ? "var " : ""}${typeInst.opt === "opt" ? "opt " : ""}`;
  const base = typeInst.base;
  switch (base.kind) {
    case "primitive":
    case "type-var":
      return `${prefix}${base.name}`;
    case "domain":
      return `${prefix}${printExpression(fragment, base.expression)}`;
    case "set":
      return `${prefix}set of ${printTypeInst(fragment, base.element)}`;
    case "array":
      return `${prefix}array[${base.dimensions
        .map((dimension) => printTypeInst(fragment, dimension))
        .join(", ")}] of ${printTypeInst(fragment, base.element)}`;
    case "tuple":
      return `${prefix}tuple(${base.fields.map((field) => printTypeInst(fragment, field)).join(", ")})`;
    case "missing":
      return `${prefix}<missing>`;
  }
};

const printParameters = (fragment: HirFragment, ids: readonly NodeId[]): string =>
  `(${ids
    .map((id) => {
      const parameter = getDeclaration(fragment, id);
      const typeInst =
        parameter.typeInst === undefined ? "<missing>" : printTypeInst(fragment, parameter.typeInst);
      return parameter.name === undefined ? typeInst : `${typeInst}: ${printName(parameter.name)}`;
    })
    .join(", ")})`;

export const printDeclaration = (
  fragment: HirFragment,
  declaration: HirDeclaration
): string => {
  const name = printName(declaration.name ?? "_");
  const annotations = annotationSuffix(fragment, declaration.annotations);
  const body =
    declaration.body === undefined ? "" : ` = ${printExpression(fragment, declaration.body)}`;
  switch (declaration.declKind) {
    case "variable": {
      const typeInst =
        declaration.typeInst === undefined
          ? "<missing>"
          : printTypeInst(fragment, declaration.typeInst);
      return `${typeInst}: ${name}${annotations}${body}`;
    }
    case "function": {
      const returnType =
        declaration.returnType === undefined
          ? "<missing>"
          : printTypeInst(fragment, declaration.returnType);
      return `function ${returnType}: ${name}${printParameters(fragment, declaration.parameters)}${annotations}${body}`;
    }
    case "predicate":
    case "test":
      return `${declaration.declKind} ${name}${printParameters(fragment, declaration.parameters)}${annotations}${body}`;
    case "annotation": {
      const parameters =
        declaration.parameters.length === 0
          ? ""
          : printParameters(fragment, declaration.parameters);
      return `annotation ${name}${parameters}${body}`;
    }
    case "enum": {
      if (declaration.cases.length > 0) {
        const cases = declaration.cases
          .map((id) => printName(getDeclaration(fragment, id).name ?? "_"))
          .join(", ");
        return `enum ${name}${annotations} = {${cases}}`;
      }
      return `enum ${name}${annotations}${body}`;
    }
    case "type-alias": {
      const aliased =
        declaration.aliased === undefined ? "<missing>" : printTypeInst(fragment, declaration.aliased);
      return `type ${name}${annotations} = ${aliased}`;
    }
  }
};

export const printItem = (fragment: HirFragment, item: HirItem): string => {
  switch (item.itemKind) {
    case "include":
      return `include "${escapeString(item.path)}"`;
    case "declaration":
      return printDeclaration(fragment, getDeclaration(fragment, item.declaration));
    case "constraint":
      return `constraint ${printExpression(fragment, item.expression)}`;
    case "solve": {
      const annotations = annotationSuffix(fragment, item.annotations);
      return item.objective === undefined
        ? `solve${annotations} ${item.goal}`
        : `solve${annotations} ${item.goal} ${printExpression(fragment, item.objective)}`;
    }
    case "output":
      return `output${annotationSuffix(fragment, item.annotations)} ${printExpression(fragment, item.expression)}`;
    case "assignment":
      return `${printExpression(fragment, item.target)} = ${printExpression(fragment, item.value)}`;
    case "error":
      return item.text.trim().replace(/;$/, "");
  }
};

export const printFragment = (fragment: HirFragment): string =>
  fragment.roots
    .map((root) => `${printItem(fragment, getItem(fragment, root))};\n`)
    .join("");
