export type TokenKind =
  | "identifier"
  | "quoted-identifier"
  | "backtick-identifier"
  | "type-inst-var"
  | "type-inst-enum-var"
  | "integer"
  | "float"
  | "string"
  | "keyword"
  | "operator"
  | "punctuation"
  | "invalid"
  | "eof";

export class Token {
  readonly kind: TokenKind;
  readonly start: number;
  readonly end: number;
  /** Raw source text of the token */
  readonly value: string;
  /** Lexer complaint for `invalid` tokens */
  readonly problem?: string;

  constructor(opts: {
    kind: TokenKind;
    start: number;
    end: number;
    value: string;
    problem?: string;
  }) {
    this.kind = opts.kind;
    this.start = opts.start;
    this.end = opts.end;
    this.value = opts.value;
    this.problem = opts.problem;
  }

  get length() {
    return this.end - this.start;
  }

  /** Identifier name with quoting removed */
  get name(): string {
    if (this.kind === "quoted-identifier" || this.kind === "backtick-identifier") {
      return this.value.slice(1, -1);
    }
    return this.value;
  }

  is(value: string): boolean {
    return (
      this.value === value &&
      (this.kind === "keyword" ||
        this.kind === "operator" ||
        this.kind === "punctuation")
    );
  }

  isKeyword(value: string): boolean {
    return this.kind === "keyword" && this.value === value;
  }

  get isIdentifier(): boolean {
    return this.kind === "identifier" || this.kind === "quoted-identifier";
  }

  describe(): string {
    if (this.kind === "eof") return "end of file";
    return `'${this.value}'`;
  }
}
