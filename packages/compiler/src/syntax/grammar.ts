export const keywords = new Set([
  "ann",
  "annotation",
  "any",
  "array",
  "bool",
  "constraint",
  "diff",
  "div",
  "else",
  "elseif",
  "endif",
  "enum",
  "false",
  "float",
  "function",
  "if",
  "in",
  "include",
  "infinity",
  "int",
  "intersect",
  "let",
  "maximize",
  "minimize",
  "mod",
  "not",
  "of",
  "opt",
  "output",
  "par",
  "predicate",
  "satisfy",
  "set",
  "solve",
  "string",
  "subset",
  "superset",
  "symdiff",
  "test",
  "then",
  "true",
  "tuple",
  "type",
  "union",
  "var",
  "where",
  "xor",
]);

/** Keywords that can only begin a top-level item */
export const itemKeywords = new Set([
  "annotation",
  "constraint",
  "enum",
  "function",
  "include",
  "output",
  "predicate",
  "solve",
  "test",
  "type",
]);

export const primitiveTypes = new Set(["ann", "bool", "float", "int", "string"]);

// Longest first so the lexer can take the first match.
export const operators = [
  "<->",
  "[|",
  "|]",
  "->",
  "<-",
  "\\/",
  "/\\",
  "<=",
  ">=",
  "==",
  "!=",
  "<>",
  "..",
  "++",
  "::",
  ":=",
  "=",
  "<",
  ">",
  "+",
  "-",
  "*",
  "/",
  "^",
  ":",
  "|",
] as const;

export const punctuation = new Set(["(", ")", "[", "]", "{", "}", ",", ";", "."]);

export type Associativity = "left" | "right" | "none";

export type BinaryOperator = {
  precedence: number;
  associativity: Associativity;
};

/** Smaller precedence binds tighter. */
export const binaryOperators: ReadonlyMap<string, BinaryOperator> = new Map([
  ["<->", { precedence: 1200, associativity: "left" }],
  ["->", { precedence: 1100, associativity: "left" }],
  ["<-", { precedence: 1100, associativity: "left" }],
  ["\\/", { precedence: 1000, associativity: "left" }],
  ["xor", { precedence: 1000, associativity: "left" }],
  ["/\\", { precedence: 900, associativity: "left" }],
  ["<", { precedence: 800, associativity: "none" }],
  [">", { precedence: 800, associativity: "none" }],
  ["<=", { precedence: 800, associativity: "none" }],
  [">=", { precedence: 800, associativity: "none" }],
  ["==", { precedence: 800, associativity: "none" }],
  ["=", { precedence: 800, associativity: "none" }],
  ["!=", { precedence: 800, associativity: "none" }],
  ["in", { precedence: 700, associativity: "none" }],
  ["subset", { precedence: 700, associativity: "none" }],
  ["superset", { precedence: 700, associativity: "none" }],
  ["union", { precedence: 600, associativity: "left" }],
  ["diff", { precedence: 600, associativity: "left" }],
  ["symdiff", { precedence: 600, associativity: "left" }],
  ["..", { precedence: 500, associativity: "none" }],
  ["+", { precedence: 400, associativity: "left" }],
  ["-", { precedence: 400, associativity: "left" }],
  ["*", { precedence: 300, associativity: "left" }],
  ["/", { precedence: 300, associativity: "left" }],
  ["div", { precedence: 300, associativity: "left" }],
  ["mod", { precedence: 300, associativity: "left" }],
  ["intersect", { precedence: 300, associativity: "left" }],
  ["^", { precedence: 200, associativity: "left" }],
  ["++", { precedence: 100, associativity: "right" }],
]);

export const BACKTICK_PRECEDENCE = 50;
export const LOOSEST_PRECEDENCE = 1200;

export const prefixOperators = new Set(["-", "+", "not"]);

export const isIdentifierStart = (char: string | undefined): boolean =>
  char !== undefined && /[A-Za-z_]/.test(char);

export const isIdentifierChar = (char: string | undefined): boolean =>
  char !== undefined && /[A-Za-z0-9_]/.test(char);

export const isDigit = (char: string | undefined): boolean =>
  char !== undefined && char >= "0" && char <= "9";

export const isWhitespace = (char: string | undefined): boolean =>
  char !== undefined && /\s/.test(char);
