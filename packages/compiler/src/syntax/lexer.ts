import { CharStream } from "./char-stream.js";
import {
  isDigit,
  isIdentifierChar,
  isIdentifierStart,
  isWhitespace,
  keywords,
  operators,
  punctuation,
} from "./grammar.js";
import { Token, type TokenKind } from "./token.js";

/**
 * Splits source text into tokens, dropping whitespace and `%` / `/* *\/`
 * comments. Never throws: malformed input becomes an `invalid` token.
 */
export class Lexer {
  private previous: Token | undefined;

  tokenize(chars: CharStream): Token[] {
    const tokens: Token[] = [];
    while (true) {
      const token = this.nextToken(chars);
      tokens.push(token);
      if (token.kind === "eof") return tokens;
    }
  }

  nextToken(chars: CharStream): Token {
    this.skipTrivia(chars);
    const start = chars.position;
    const char = chars.next;

    if (char === undefined) {
      return this.emit(chars, "eof", start);
    }

    if (chars.startsWith("/*")) {
      // skipTrivia stops on an unterminated block comment
      chars.consumeWhile(() => true);
      return this.emit(chars, "invalid", start, "unterminated block comment");
    }

    if (isDigit(char) && this.previous?.value !== ".") {
      return this.consumeNumber(chars, start);
    }

    if (isDigit(char)) {
      chars.consumeWhile(isDigit);
      return this.emit(chars, "integer", start);
    }

    if (isIdentifierStart(char)) {
      const word = chars.consumeWhile(isIdentifierChar);
      return this.emit(chars, keywords.has(word) ? "keyword" : "identifier", start);
    }

    if (char === "$") {
      return this.consumeTypeInstVar(chars, start);
    }

    if (char === "'" || char === "`") {
      return this.consumeQuoted(chars, start, char);
    }

    if (char === '"') {
      return this.consumeString(chars, start);
    }

    const operator = operators.find((candidate) => chars.startsWith(candidate));
    if (operator) {
      for (let i = 0; i < operator.length; i += 1) chars.consumeChar();
      return this.emit(chars, "operator", start);
    }

    if (punctuation.has(char)) {
      chars.consumeChar();
      return this.emit(chars, "punctuation", start);
    }

    chars.consumeChar();
    return this.emit(chars, "invalid", start, `unexpected character '${char}'`);
  }

  private emit(
    chars: CharStream,
    kind: TokenKind,
    start: number,
    problem?: string
  ): Token {
    const token = new Token({
      kind,
      start,
      end: chars.position,
      value: chars.text.slice(start, chars.position),
      problem,
    });
    this.previous = token;
    return token;
  }

  private skipTrivia(chars: CharStream): void {
    while (chars.hasCharacters) {
      if (isWhitespace(chars.next)) {
        chars.consumeWhile(isWhitespace);
        continue;
      }

      if (chars.next === "%") {
        chars.consumeWhile((char) => char !== "\n");
        continue;
      }

      if (chars.startsWith("/*")) {
        const close = chars.text.indexOf("*/", chars.position + 2);
        if (close < 0 || close + 2 > chars.end) return;
        chars.location.index = close + 2;
        continue;
      }

      return;
    }
  }

  private consumeNumber(chars: CharStream, start: number): Token {
    if (chars.next === "0" && /[xob]/.test(chars.at(1) ?? "")) {
      const radix = chars.at(1);
      const digit =
        radix === "x" ? /[0-9A-Fa-f]/ : radix === "o" ? /[0-7]/ : /[01]/;
      if (digit.test(chars.at(2) ?? "")) {
        chars.consumeChar();
        chars.consumeChar();
        chars.consumeWhile((char) => digit.test(char));
        return this.emit(chars, "integer", start);
      }
    }

    chars.consumeWhile(isDigit);
    let kind: TokenKind = "integer";

    if (chars.next === "." && isDigit(chars.at(1))) {
      chars.consumeChar();
      chars.consumeWhile(isDigit);
      kind = "float";
    }

    if (chars.next === "e" || chars.next === "E") {
      const sign = chars.at(1) === "+" || chars.at(1) === "-" ? 1 : 0;
      if (isDigit(chars.at(1 + sign))) {
        chars.consumeChar();
        if (sign) chars.consumeChar();
        chars.consumeWhile(isDigit);
        kind = "float";
      }
    }

    return this.emit(chars, kind, start);
  }

  private consumeTypeInstVar(chars: CharStream, start: number): Token {
    chars.consumeChar();
    const kind: TokenKind = chars.next === "$" ? "type-inst-enum-var" : "type-inst-var";
    if (chars.next === "$") chars.consumeChar();
    if (!isIdentifierStart(chars.next)) {
      return this.emit(chars, "invalid", start, "expected a type-inst variable name");
    }
    chars.consumeWhile(isIdentifierChar);
    return this.emit(chars, kind, start);
  }

  private consumeQuoted(chars: CharStream, start: number, quote: string): Token {
    chars.consumeChar();
    chars.consumeWhile((char) => char !== quote && char !== "\n");
    if (chars.next !== quote) {
      return this.emit(chars, "invalid", start, "unterminated quoted identifier");
    }
    chars.consumeChar();
    const kind = quote === "'" ? "quoted-identifier" : "backtick-identifier";
    return this.emit(chars, kind, start);
  }

  /**
   * Strings keep their raw text; `\(` interpolations are balanced here so a
   * `"` inside one does not end the literal.
   */
  private consumeString(chars: CharStream, start: number): Token {
    chars.consumeChar();
    let depth = 0;
    while (chars.hasCharacters) {
      const char = chars.consumeChar();
      if (depth === 0) {
        if (char === '"') return this.emit(chars, "string", start);
        if (char === "\n") break;
        if (char === "\\") {
          if (chars.next === "(") depth = 1;
          if (chars.hasCharacters) chars.consumeChar();
        }
        continue;
      }

      if (char === "(") depth += 1;
      if (char === ")") depth -= 1;
      if (char === '"') {
        chars.consumeWhile((inner) => inner !== '"' && inner !== "\n");
        if (chars.next === '"') chars.consumeChar();
      }
    }
    return this.emit(chars, "invalid", start, "unterminated string literal");
  }
}

export const tokenize = (
  text: string,
  range: { start?: number; end?: number } = {}
): Token[] => new Lexer().tokenize(new CharStream(text, range));
