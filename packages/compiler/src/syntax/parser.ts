import { CstNode, ERROR_KIND, type SyntaxErrorRecord, type SyntaxTree } from "./cst.js";
import {
  BACKTICK_PRECEDENCE,
  LOOSEST_PRECEDENCE,
  binaryOperators,
  itemKeywords,
  prefixOperators,
  primitiveTypes,
  type Associativity,
} from "./grammar.js";
import { tokenize } from "./lexer.js";
import type { Token } from "./token.js";

class ParseFailure extends Error {
  readonly record: SyntaxErrorRecord;

  constructor(record: SyntaxErrorRecord) {
    super(`expected ${record.expected}, found ${record.found}`);
    this.record = record;
  }
}

type OperatorInfo = {
  precedence: number;
  associativity: Associativity;
};

const OPENERS = new Set(["(", "[", "{", "[|"]);
const CLOSERS = new Set([")", "]", "}", "|]"]);

type Child = CstNode | undefined;

/**
 * Recursive descent parser producing a tree-sitter shaped CST. A malformed
 * item body becomes an ERROR node in place of its expression; a malformed
 * item head turns the whole item into one ERROR node. Either way parsing
 * resumes at the next item.
 */
export class Parser {
  readonly #text: string;
  readonly #file: string;
  readonly #tokens: Token[];
  #index = 0;
  #letDepth = 0;
  readonly #errors: SyntaxErrorRecord[] = [];

  constructor({
    text,
    file,
    range,
  }: {
    text: string;
    file: string;
    range?: { start: number; end: number };
  }) {
    this.#text = text;
    this.#file = file;
    this.#tokens = tokenize(text, range);
  }

  parseSourceFile(): SyntaxTree {
    const items: CstNode[] = [];
    while (this.#peek().kind !== "eof") {
      const start = this.#index;
      try {
        items.push(this.#parseItem());
      } catch (error) {
        if (!(error instanceof ParseFailure)) throw error;
        this.#errors.push(error.record);
        items.push(this.#recover(start));
      }
    }

    const root = new CstNode({
      kind: "source_file",
      span: { start: 0, end: this.#text.length },
      source: this.#text,
      children: items,
    });
    return { file: this.#file, text: this.#text, root, errors: this.#errors };
  }

  /** Parses the whole token range as one expression. Throws on failure. */
  parseStandaloneExpression(): CstNode {
    const expression = this.#parseExpression();
    const [recovered] = this.#errors;
    if (recovered) throw new ParseFailure(recovered);
    if (this.#peek().kind !== "eof") this.#fail("end of expression");
    return expression;
  }

  // Items

  #parseItem(): CstNode {
    const token = this.#peek();
    if (token.kind === "keyword") {
      switch (token.value) {
        case "include":
          return this.#parseInclude();
        case "constraint":
          return this.#finishItem("constraint", [
            this.#keyword("constraint"),
            this.#parseBody("expression"),
          ]);
        case "solve":
          return this.#parseSolve();
        case "output":
          return this.#finishItem("output", [
            this.#keyword("output"),
            ...this.#parseAnnotations(),
            this.#parseBody("expression"),
          ]);
        case "function":
          return this.#parseFunction();
        case "predicate":
          return this.#parsePredicate("predicate");
        case "test":
          return this.#parsePredicate("test");
        case "annotation":
          return this.#parseAnnotationItem();
        case "enum":
          return this.#parseEnum();
        case "type":
          return this.#parseTypeAlias();
      }
    }

    const following = this.#peek(1);
    if (token.isIdentifier && (following.is("=") || following.is(":="))) {
      return this.#finishItem("assignment", [
        this.#field("name", this.#parseIdentifier()),
        this.#leaf(this.#advance()),
        this.#parseBody("definition"),
      ]);
    }

    return this.#finishItem("declaration", this.#parseDeclarationParts());
  }

  #finishItem(kind: string, children: Child[]): CstNode {
    // A recovered body already stopped at the next item.
    const recovered = children[children.length - 1]?.isError === true;
    const semicolon = this.#peek().is(";")
      ? this.#leaf(this.#advance())
      : this.#peek().kind === "eof" || recovered
        ? undefined
        : this.#fail("';'");
    return this.#node(kind, [...children, semicolon]);
  }

  #parseInclude(): CstNode {
    const keyword = this.#keyword("include");
    const file = this.#peek();
    if (file.kind !== "string") this.#fail("a file name string");
    this.#advance();
    return this.#finishItem("include", [
      keyword,
      this.#leaf(file, { kind: "string_literal", field: "file" }),
    ]);
  }

  #parseSolve(): CstNode {
    const keyword = this.#keyword("solve");
    const annotations = this.#parseAnnotations();
    const goal = this.#peek();
    if (goal.isKeyword("satisfy")) {
      this.#advance();
      return this.#finishItem("solve", [
        keyword,
        ...annotations,
        this.#leaf(goal, { kind: "solve_goal", field: "goal" }),
      ]);
    }
    if (goal.isKeyword("minimize") || goal.isKeyword("maximize")) {
      this.#advance();
      return this.#finishItem("solve", [
        keyword,
        ...annotations,
        this.#leaf(goal, { kind: "solve_goal", field: "goal" }),
        this.#parseBody("objective"),
      ]);
    }
    return this.#fail("'satisfy', 'minimize' or 'maximize'");
  }

  #parseFunction(): CstNode {
    const keyword = this.#keyword("function");
    const returnType = this.#field("return_type", this.#parseTypeInst());
    const colon = this.#expect(":");
    const name = this.#field("name", this.#parseIdentifier());
    return this.#finishItem("function_item", [
      keyword,
      returnType,
      colon,
      name,
      ...this.#parseParameters(),
      ...this.#parseAnnotations(),
      ...this.#parseDefinition("body"),
    ]);
  }

  #parsePredicate(kind: "predicate" | "test"): CstNode {
    const keyword = this.#keyword(kind);
    const name = this.#field("name", this.#parseIdentifier());
    return this.#finishItem(kind, [
      keyword,
      name,
      ...this.#parseParameters(),
      ...this.#parseAnnotations(),
      ...this.#parseDefinition("body"),
    ]);
  }

  #parseAnnotationItem(): CstNode {
    const keyword = this.#keyword("annotation");
    const name = this.#field("name", this.#parseIdentifier());
    const parameters = this.#peek().is("(") ? this.#parseParameters() : [];
    return this.#finishItem("annotation_item", [
      keyword,
      name,
      ...parameters,
      ...this.#parseDefinition("body"),
    ]);
  }

  #parseEnum(): CstNode {
    const keyword = this.#keyword("enum");
    const name = this.#field("name", this.#parseIdentifier());
    const annotations = this.#parseAnnotations();
    if (!this.#peek().is("=")) {
      return this.#finishItem("enumeration", [keyword, name, ...annotations]);
    }

    const equals = this.#leaf(this.#advance());
    if (!this.#peek().is("{") || !this.#isEnumCaseList()) {
      return this.#finishItem("enumeration", [
        keyword,
        name,
        ...annotations,
        equals,
        this.#parseBody("definition"),
      ]);
    }

    const open = this.#leaf(this.#advance());
    const cases: Child[] = [];
    while (!this.#peek().is("}")) {
      cases.push(this.#field("case", this.#parseIdentifier()));
      if (!this.#peek().is(",")) break;
      cases.push(this.#leaf(this.#advance()));
    }
    const close = this.#expect("}");
    return this.#finishItem("enumeration", [
      keyword,
      name,
      ...annotations,
      equals,
      this.#node("enum_cases", [open, ...cases, close], "cases"),
    ]);
  }

  /** `{ A, B, C }` followed by the end of the item */
  #isEnumCaseList(): boolean {
    let offset = 1;
    while (true) {
      const token = this.#peek(offset);
      if (token.is("}")) {
        const after = this.#peek(offset + 1);
        return after.is(";") || after.kind === "eof";
      }
      if (!token.isIdentifier && !token.is(",")) return false;
      offset += 1;
    }
  }

  #parseTypeAlias(): CstNode {
    const keyword = this.#keyword("type");
    const name = this.#field("name", this.#parseIdentifier());
    const annotations = this.#parseAnnotations();
    const equals = this.#expect("=");
    return this.#finishItem("type_alias", [
      keyword,
      name,
      ...annotations,
      equals,
      this.#field("type", this.#parseTypeInst()),
    ]);
  }

  /** `ti : name annotations [= definition]`, shared by items and let */
  #parseDeclarationParts(): Child[] {
    const type = this.#field("type", this.#parseTypeInst());
    const colon = this.#expect(":");
    const name = this.#field("name", this.#parseIdentifier());
    return [
      type,
      colon,
      name,
      ...this.#parseAnnotations(),
      ...this.#parseDefinition("definition"),
    ];
  }

  #parseDefinition(field: string): Child[] {
    const token = this.#peek();
    if (!token.is("=") && !token.is(":=")) return [];
    const equals = this.#leaf(this.#advance());
    return [equals, this.#parseBody(field)];
  }

  #parseParameters(): Child[] {
    const open = this.#expect("(");
    const children: Child[] = [open];
    while (!this.#peek().is(")")) {
      children.push(this.#parseParameter());
      if (!this.#peek().is(",")) break;
      children.push(this.#leaf(this.#advance()));
    }
    children.push(this.#expect(")"));
    return children;
  }

  #parseParameter(): CstNode {
    const type = this.#field("type", this.#parseTypeInst());
    if (!this.#peek().is(":")) {
      return this.#node("parameter", [type], "parameter");
    }
    const colon = this.#leaf(this.#advance());
    const name = this.#field("name", this.#parseIdentifier());
    return this.#node(
      "parameter",
      [type, colon, name, ...this.#parseAnnotations()],
      "parameter"
    );
  }

  #parseAnnotations(): CstNode[] {
    const annotations: CstNode[] = [];
    while (this.#peek().is("::")) {
      annotations.push(this.#leaf(this.#advance()));
      annotations.push(this.#field("annotation", this.#parsePostfix()));
    }
    return annotations;
  }

  // Type-insts

  #parseTypeInst(): CstNode {
    const prefix: CstNode[] = [];
    const token = this.#peek();
    if (token.isKeyword("var") || token.isKeyword("par")) {
      prefix.push(this.#leaf(this.#advance(), { kind: "inst", field: "inst" }));
    }
    if (this.#peek().isKeyword("opt")) {
      prefix.push(this.#leaf(this.#advance(), { kind: "opt", field: "opt" }));
    }

    const base = this.#peek();
    if (base.isKeyword("array")) {
      const keyword = this.#leaf(this.#advance());
      const open = this.#expect("[");
      const dimensions: Child[] = [];
      while (true) {
        dimensions.push(this.#field("dimension", this.#parseTypeInst()));
        if (!this.#peek().is(",")) break;
        dimensions.push(this.#leaf(this.#advance()));
      }
      const close = this.#expect("]");
      const of = this.#keyword("of");
      const element = this.#field("element", this.#parseTypeInst());
      return this.#node("array_type", [
        ...prefix,
        keyword,
        open,
        ...dimensions,
        close,
        of,
        element,
      ]);
    }

    if (base.isKeyword("set")) {
      const keyword = this.#leaf(this.#advance());
      const of = this.#keyword("of");
      const element = this.#field("element", this.#parseTypeInst());
      return this.#node("set_type", [...prefix, keyword, of, element]);
    }

    if (base.isKeyword("tuple")) {
      const keyword = this.#leaf(this.#advance());
      const open = this.#expect("(");
      const fields: Child[] = [];
      while (!this.#peek().is(")")) {
        fields.push(this.#field("field", this.#parseTypeInst()));
        if (!this.#peek().is(",")) break;
        fields.push(this.#leaf(this.#advance()));
      }
      const close = this.#expect(")");
      return this.#node("tuple_type", [...prefix, keyword, open, ...fields, close]);
    }

    if (base.kind === "keyword" && primitiveTypes.has(base.value)) {
      this.#advance();
      return this.#node("type_base", [
        ...prefix,
        this.#leaf(base, { kind: "primitive_type", field: "domain" }),
      ]);
    }

    if (base.kind === "type-inst-var" || base.kind === "type-inst-enum-var") {
      this.#advance();
      const kind = base.kind === "type-inst-var" ? "type_inst_id" : "type_inst_enum_id";
      return this.#node("type_base", [
        ...prefix,
        this.#leaf(base, { kind, field: "domain" }),
      ]);
    }

    const domain = this.#parseBinary(LOOSEST_PRECEDENCE);
    return this.#node("type_base", [...prefix, domain.withField("domain")]);
  }

  // Expressions

  #parseExpression(): CstNode {
    const expression = this.#parseBinary(LOOSEST_PRECEDENCE);
    if (!this.#peek().is("::")) return expression;
    return this.#node("annotated_expression", [
      expression.withField("expression"),
      ...this.#parseAnnotations(),
    ]);
  }

  #operatorAt(token: Token): OperatorInfo | undefined {
    if (token.kind === "backtick-identifier") {
      return { precedence: BACKTICK_PRECEDENCE, associativity: "left" };
    }
    if (token.kind !== "operator" && token.kind !== "keyword") return undefined;
    return binaryOperators.get(token.value);
  }

  #parseBinary(limit: number): CstNode {
    let left = this.#parseUnary();
    while (true) {
      const info = this.#operatorAt(this.#peek());
      if (!info || info.precedence > limit) return left;

      const operator = this.#leaf(this.#advance(), {
        kind: "operator",
        field: "operator",
      });
      const rightLimit =
        info.associativity === "right" ? info.precedence : info.precedence - 1;
      const right = this.#parseBinary(rightLimit);
      left = this.#node("infix_operator", [
        left.withField("left"),
        operator,
        right.withField("right"),
      ]);
    }
  }

  #parseUnary(): CstNode {
    const token = this.#peek();
    const isPrefix =
      (token.kind === "operator" || token.kind === "keyword") &&
      prefixOperators.has(token.value);
    if (!isPrefix) return this.#parsePostfix();

    const operator = this.#leaf(this.#advance(), {
      kind: "operator",
      field: "operator",
    });
    return this.#node("prefix_operator", [
      operator,
      this.#field("operand", this.#parseUnary()),
    ]);
  }

  #parsePostfix(): CstNode {
    let expression = this.#parsePrimary();
    while (true) {
      const token = this.#peek();
      if (token.is("[")) {
        const open = this.#leaf(this.#advance());
        const indices = this.#parseSeparated("]", "index");
        const close = this.#expect("]");
        expression = this.#node("indexed_access", [
          expression.withField("collection"),
          open,
          ...indices,
          close,
        ]);
        continue;
      }
      if (token.is(".") && this.#peek(1).kind === "integer") {
        const dot = this.#leaf(this.#advance());
        const field = this.#leaf(this.#advance(), {
          kind: "integer_literal",
          field: "field",
        });
        expression = this.#node("tuple_access", [
          expression.withField("tuple"),
          dot,
          field,
        ]);
        continue;
      }
      return expression;
    }
  }

  #parsePrimary(): CstNode {
    const token = this.#peek();
    switch (token.kind) {
      case "integer":
        return this.#leaf(this.#advance(), { kind: "integer_literal" });
      case "float":
        return this.#leaf(this.#advance(), { kind: "float_literal" });
      case "string":
        return this.#parseString(this.#advance());
      case "identifier":
      case "quoted-identifier":
        if (token.value === "_") {
          return this.#leaf(this.#advance(), { kind: "anonymous" });
        }
        if (this.#peek(1).is("(")) return this.#parseCall();
        return this.#parseIdentifier();
      case "invalid":
        return this.#fail("an expression");
      default:
        break;
    }

    if (token.isKeyword("true") || token.isKeyword("false")) {
      return this.#leaf(this.#advance(), { kind: "boolean_literal" });
    }
    if (token.isKeyword("infinity")) {
      return this.#leaf(this.#advance(), { kind: "infinity" });
    }
    if (token.is("<>")) {
      return this.#leaf(this.#advance(), { kind: "absent" });
    }
    if (token.isKeyword("if")) return this.#parseIfThenElse();
    if (token.isKeyword("let")) return this.#parseLet();
    if (token.is("(")) return this.#parseParenthesised();
    if (token.is("[")) return this.#parseArrayLiteral();
    if (token.is("[|")) return this.#parseArrayLiteral2d();
    if (token.is("{")) return this.#parseSetLiteral();

    return this.#fail("an expression");
  }

  #parseIdentifier(): CstNode {
    const token = this.#peek();
    if (!token.isIdentifier) this.#fail("an identifier");
    this.#advance();
    return this.#leaf(token, { kind: "identifier" });
  }

  #parseCall(): CstNode {
    const callee = this.#field("function", this.#parseIdentifier());
    if (this.#isGeneratorCall()) {
      const open = this.#leaf(this.#advance());
      const generators = this.#parseGenerators();
      const close = this.#expect(")");
      const bodyOpen = this.#expect("(");
      const template = this.#field("template", this.#parseExpression());
      const bodyClose = this.#expect(")");
      return this.#node("generator_call", [
        callee,
        open,
        ...generators,
        close,
        bodyOpen,
        template,
        bodyClose,
      ]);
    }

    const open = this.#leaf(this.#advance());
    const args = this.#parseSeparated(")", "argument");
    const close = this.#expect(")");
    return this.#node("call", [callee, open, ...args, close]);
  }

  /** `f(...)(...)`: the argument list is immediately followed by a body */
  #isGeneratorCall(): boolean {
    let depth = 0;
    for (let offset = 0; ; offset += 1) {
      const token = this.#peek(offset);
      if (token.kind === "eof") return false;
      if (token.kind !== "operator" && token.kind !== "punctuation") continue;
      if (OPENERS.has(token.value)) depth += 1;
      if (CLOSERS.has(token.value)) {
        depth -= 1;
        if (depth === 0) return this.#peek(offset + 1).is("(");
      }
    }
  }

  #parseSeparated(close: string, field: string): Child[] {
    const children: Child[] = [];
    while (!this.#peek().is(close)) {
      children.push(this.#field(field, this.#parseExpression()));
      if (!this.#peek().is(",")) break;
      children.push(this.#leaf(this.#advance()));
    }
    return children;
  }

  #parseGenerators(): Child[] {
    const generators: Child[] = [this.#parseGenerator()];
    while (this.#peek().is(",")) {
      generators.push(this.#leaf(this.#advance()));
      generators.push(this.#parseGenerator());
    }
    return generators;
  }

  #parseGenerator(): CstNode {
    const first = this.#peek();
    if (first.isIdentifier && this.#peek(1).is("=")) {
      const name = this.#field("name", this.#parseIdentifier());
      const equals = this.#leaf(this.#advance());
      const value = this.#field("value", this.#parseBinary(LOOSEST_PRECEDENCE));
      return this.#node(
        "assignment_generator",
        [name, equals, value, ...this.#parseWhere()],
        "generator"
      );
    }

    const patterns: Child[] = [this.#parsePattern()];
    while (this.#continuesPatternList()) {
      patterns.push(this.#leaf(this.#advance()));
      patterns.push(this.#parsePattern());
    }
    const keyword = this.#keyword("in");
    const collection = this.#field(
      "collection",
      this.#parseBinary(LOOSEST_PRECEDENCE)
    );
    return this.#node(
      "generator",
      [...patterns, keyword, collection, ...this.#parseWhere()],
      "generator"
    );
  }

  #continuesPatternList(): boolean {
    if (!this.#peek().is(",")) return false;
    const name = this.#peek(1);
    const after = this.#peek(2);
    return name.isIdentifier && (after.is(",") || after.isKeyword("in"));
  }

  #parsePattern(): CstNode {
    const token = this.#peek();
    if (!token.isIdentifier) this.#fail("a generator variable");
    this.#advance();
    const kind = token.value === "_" ? "anonymous" : "identifier";
    return this.#leaf(token, { kind, field: "pattern" });
  }

  #parseWhere(): Child[] {
    if (!this.#peek().isKeyword("where")) return [];
    const keyword = this.#leaf(this.#advance());
    return [keyword, this.#field("where", this.#parseBinary(LOOSEST_PRECEDENCE))];
  }

  #parseIfThenElse(): CstNode {
    const children: Child[] = [this.#keyword("if")];
    children.push(this.#field("condition", this.#parseExpression()));
    children.push(this.#keyword("then"));
    children.push(this.#field("result", this.#parseExpression()));
    while (this.#peek().isKeyword("elseif")) {
      children.push(this.#leaf(this.#advance()));
      children.push(this.#field("condition", this.#parseExpression()));
      children.push(this.#keyword("then"));
      children.push(this.#field("result", this.#parseExpression()));
    }
    if (this.#peek().isKeyword("else")) {
      children.push(this.#leaf(this.#advance()));
      children.push(this.#field("else", this.#parseExpression()));
    }
    children.push(this.#keyword("endif"));
    return this.#node("if_then_else", children);
  }

  #parseLet(): CstNode {
    const children: Child[] = [this.#keyword("let"), this.#expect("{")];
    this.#letDepth += 1;
    try {
      this.#parseLetItems(children);
    } finally {
      this.#letDepth -= 1;
    }
    children.push(this.#expect("}"));
    children.push(this.#keyword("in"));
    children.push(this.#field("in", this.#parseExpression()));
    return this.#node("let_expression", children);
  }

  #parseLetItems(children: Child[]): void {
    while (!this.#peek().is("}")) {
      if (this.#peek().isKeyword("constraint")) {
        const keyword = this.#leaf(this.#advance());
        children.push(
          this.#node(
            "constraint",
            [keyword, this.#parseBody("expression")],
            "item"
          )
        );
      } else {
        children.push(
          this.#node("declaration", this.#parseDeclarationParts(), "item")
        );
      }
      const separator = this.#peek();
      if (!separator.is(";") && !separator.is(",")) break;
      children.push(this.#leaf(this.#advance()));
    }
  }

  #parseParenthesised(): CstNode {
    const open = this.#leaf(this.#advance());
    const first = this.#field("member", this.#parseExpression());
    if (this.#peek().is(")")) {
      const close = this.#leaf(this.#advance());
      return this.#node("parenthesised_expression", [
        open,
        first.withField("expression"),
        close,
      ]);
    }

    const members: Child[] = [first];
    while (this.#peek().is(",")) {
      members.push(this.#leaf(this.#advance()));
      if (this.#peek().is(")")) break;
      members.push(this.#field("member", this.#parseExpression()));
    }
    const close = this.#expect(")");
    return this.#node("tuple_literal", [open, ...members, close]);
  }

  #parseArrayLiteral(): CstNode {
    const open = this.#leaf(this.#advance());
    if (this.#peek().is("]")) {
      return this.#node("array_literal", [open, this.#leaf(this.#advance())]);
    }

    const first = this.#parseExpression();
    if (this.#peek().is("|")) {
      return this.#finishComprehension("array_comprehension", open, first, "]");
    }

    const members: Child[] = [first.withField("member")];
    while (this.#peek().is(",")) {
      members.push(this.#leaf(this.#advance()));
      if (this.#peek().is("]")) break;
      members.push(this.#field("member", this.#parseExpression()));
    }
    const close = this.#expect("]");
    return this.#node("array_literal", [open, ...members, close]);
  }

  #parseSetLiteral(): CstNode {
    const open = this.#leaf(this.#advance());
    if (this.#peek().is("}")) {
      return this.#node("set_literal", [open, this.#leaf(this.#advance())]);
    }

    const first = this.#parseExpression();
    if (this.#peek().is("|")) {
      return this.#finishComprehension("set_comprehension", open, first, "}");
    }

    const members: Child[] = [first.withField("member")];
    while (this.#peek().is(",")) {
      members.push(this.#leaf(this.#advance()));
      if (this.#peek().is("}")) break;
      members.push(this.#field("member", this.#parseExpression()));
    }
    const close = this.#expect("}");
    return this.#node("set_literal", [open, ...members, close]);
  }

  #finishComprehension(
    kind: string,
    open: CstNode,
    template: CstNode,
    close: string
  ): CstNode {
    const bar = this.#leaf(this.#advance());
    const generators = this.#parseGenerators();
    const end = this.#expect(close);
    return this.#node(kind, [
      open,
      template.withField("template"),
      bar,
      ...generators,
      end,
    ]);
  }

  #parseArrayLiteral2d(): CstNode {
    const open = this.#leaf(this.#advance());
    const rows: Child[] = [];
    while (!this.#peek().is("|]")) {
      const members: Child[] = [];
      while (!this.#peek().is("|") && !this.#peek().is("|]")) {
        members.push(this.#field("member", this.#parseExpression()));
        if (!this.#peek().is(",")) break;
        members.push(this.#leaf(this.#advance()));
      }
      if (members.length === 0) this.#fail("an array row");
      rows.push(this.#node("array_literal_2d_row", members, "row"));
      if (!this.#peek().is("|")) break;
      rows.push(this.#leaf(this.#advance()));
    }
    const close = this.#expect("|]");
    return this.#node("array_literal_2d", [open, ...rows, close]);
  }

  #parseString(token: Token): CstNode {
    const raw = token.value;
    const segments: CstNode[] = [];
    let textStart = 1;
    let cursor = 1;
    while (cursor < raw.length - 1) {
      if (raw[cursor] !== "\\") {
        cursor += 1;
        continue;
      }
      if (raw[cursor + 1] !== "(") {
        cursor += 2;
        continue;
      }

      const expressionStart = cursor + 2;
      const expressionEnd = this.#findInterpolationEnd(raw, expressionStart);
      if (cursor > textStart) {
        segments.push(this.#stringContent(token, textStart, cursor));
      }
      const parser = new Parser({
        text: this.#text,
        file: this.#file,
        range: {
          start: token.start + expressionStart,
          end: token.start + expressionEnd,
        },
      });
      segments.push(parser.parseStandaloneExpression().withField("interpolation"));
      cursor = expressionEnd + 1;
      textStart = cursor;
    }

    if (segments.length === 0) {
      return this.#leaf(token, { kind: "string_literal" });
    }
    if (raw.length - 1 > textStart) {
      segments.push(this.#stringContent(token, textStart, raw.length - 1));
    }
    return new CstNode({
      kind: "string_interpolation",
      span: { start: token.start, end: token.end },
      source: this.#text,
      children: segments,
    });
  }

  #findInterpolationEnd(raw: string, start: number): number {
    let depth = 1;
    for (let index = start; index < raw.length; index += 1) {
      const char = raw[index];
      if (char === "(") depth += 1;
      if (char === ")") {
        depth -= 1;
        if (depth === 0) return index;
      }
    }
    return this.#fail("')' closing the string interpolation");
  }

  #stringContent(token: Token, start: number, end: number): CstNode {
    return new CstNode({
      kind: "string_content",
      span: { start: token.start + start, end: token.start + end },
      source: this.#text,
      field: "content",
    });
  }

  // Recovery

  /**
   * An expression filling `field` of an item. On failure the tokens up to
   * the end of the item become an ERROR node and the item itself survives.
   */
  #parseBody(field: string): CstNode {
    const start = this.#index;
    try {
      return this.#field(field, this.#parseExpression());
    } catch (error) {
      if (!(error instanceof ParseFailure)) throw error;
      this.#errors.push(error.record);
      this.#index = start;
      return this.#errorNode(this.#skipBody()).withField(field);
    }
  }

  /** Consumes a broken body, leaving its terminator in place */
  #skipBody(): CstNode[] {
    const consumed: CstNode[] = [];
    const openers: string[] = [];
    while (true) {
      const token = this.#peek();
      if (token.kind === "eof") break;
      if (openers.length === 0) {
        if (token.is(";")) break;
        if (this.#letDepth > 0 && (token.is(",") || token.is("}"))) break;
      } else if (token.is(";") && this.#semicolonEndsItem(openers)) {
        break;
      }
      if (this.#isItemStart(token, openers)) break;
      this.#track(token, openers);
      consumed.push(this.#leaf(this.#advance()));
    }
    return consumed;
  }

  #recover(startIndex: number): CstNode {
    this.#index = startIndex;
    const consumed: CstNode[] = [];
    const openers: string[] = [];
    while (true) {
      const token = this.#peek();
      if (token.kind === "eof") break;
      if (token.is(";") && (openers.length === 0 || this.#semicolonEndsItem(openers))) {
        consumed.push(this.#leaf(this.#advance()));
        break;
      }
      if (consumed.length > 0 && this.#isItemStart(token, openers)) break;
      this.#track(token, openers);
      consumed.push(this.#leaf(this.#advance()));
    }
    return this.#errorNode(consumed);
  }

  /**
   * Inside an unclosed `{` a `;` may separate let items, so it only ends the
   * item when the next token starts a line.
   */
  #semicolonEndsItem(openers: readonly string[]): boolean {
    if (openers[openers.length - 1] !== "{") return true;
    const next = this.#peek(1);
    return next.kind === "eof" || this.#atLineStart(next);
  }

  #isItemStart(token: Token, openers: readonly string[]): boolean {
    if (token.kind !== "keyword" || !itemKeywords.has(token.value)) return false;
    return openers.length === 0 || openers[openers.length - 1] !== "{" || this.#atLineStart(token);
  }

  #atLineStart(token: Token): boolean {
    return token.start === 0 || this.#text[token.start - 1] === "\n";
  }

  #track(token: Token, openers: string[]): void {
    if (token.kind !== "operator" && token.kind !== "punctuation") return;
    if (OPENERS.has(token.value)) openers.push(token.value);
    if (CLOSERS.has(token.value)) openers.pop();
  }

  #errorNode(consumed: readonly CstNode[]): CstNode {
    const first = consumed[0];
    const last = consumed[consumed.length - 1];
    return new CstNode({
      kind: ERROR_KIND,
      span: {
        start: first ? first.span.start : this.#peek().start,
        end: last ? last.span.end : this.#peek().start,
      },
      source: this.#text,
      children: consumed,
    });
  }

  // Token helpers

  #peek(offset = 0): Token {
    const index = Math.min(this.#index + offset, this.#tokens.length - 1);
    return this.#tokens[index];
  }

  #advance(): Token {
    const token = this.#peek();
    if (token.kind !== "eof") this.#index += 1;
    return token;
  }

  #expect(value: string): CstNode {
    if (!this.#peek().is(value)) this.#fail(`'${value}'`);
    return this.#leaf(this.#advance());
  }

  #keyword(value: string): CstNode {
    if (!this.#peek().isKeyword(value)) this.#fail(`'${value}'`);
    return this.#leaf(this.#advance());
  }

  #fail(expected: string): never {
    const token = this.#peek();
    throw new ParseFailure({
      span: { start: token.start, end: token.end },
      expected,
      found: token.describe(),
      problem: token.problem,
    });
  }

  #leaf(
    token: Token,
    { kind, field }: { kind?: string; field?: string } = {}
  ): CstNode {
    return new CstNode({
      kind: kind ?? token.value,
      span: { start: token.start, end: token.end },
      source: this.#text,
      field,
      named: kind !== undefined,
    });
  }

  #field(field: string, node: CstNode): CstNode {
    return node.withField(field);
  }

  #node(kind: string, children: Child[], field?: string): CstNode {
    const present = children.filter((child): child is CstNode => child !== undefined);
    const first = present[0];
    const last = present[present.length - 1];
    const start = first ? first.span.start : this.#peek().start;
    return new CstNode({
      kind,
      span: { start, end: last ? last.span.end : start },
      source: this.#text,
      field,
      children: present,
    });
  }
}

export const parse = (text: string, file: string): SyntaxTree =>
  new Parser({ text, file }).parseSourceFile();
