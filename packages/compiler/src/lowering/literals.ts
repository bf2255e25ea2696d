import type { SyntaxNode } from "../syntax/cst.js";

const escapes: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  '"': '"',
  "'": "'",
  "\\": "\\",
};

/** Decodes the escapes of a string literal body (quotes already removed). */
export const unescapeString = (raw: string): string => {
  let value = "";
  for (let index = 0; index < raw.length; index += 1) {
    const char = raw[index];
    if (char !== "\\" || index + 1 >= raw.length) {
      value += char;
      continue;
    }
    const next = raw[index + 1];
    value += escapes[next] ?? next;
    index += 1;
  }
  return value;
};

export const escapeString = (value: string): string =>
  value.replace(/[\\"\n\t\r]/g, (char) => {
    switch (char) {
      case "\n":
        return "\\n";
      case "\t":
        return "\\t";
      case "\r":
        return "\\r";
      default:
        return `\\${char}`;
    }
  });

export const stringLiteralValue = (node: SyntaxNode): string =>
  unescapeString(node.text().slice(1, -1));

/** Canonical decimal form of decimal, hex, octal and binary literals */
export const integerLiteralValue = (text: string): string => {
  try {
    return BigInt(text).toString();
  } catch (error) {
    if (error instanceof SyntaxError) return text;
    throw error;
  }
};

/** Identifier text with `'quoting'` or backticks removed */
export const identifierName = (text: string): string => {
  const quoted =
    text.length >= 2 &&
    ((text.startsWith("'") && text.endsWith("'")) ||
      (text.startsWith("`") && text.endsWith("`")));
  return quoted ? text.slice(1, -1) : text;
};

/** Function name an operator desugars to */
export const operatorFunctionName = (surface: string): string => {
  const name = identifierName(surface);
  return name === "==" ? "=" : name;
};
