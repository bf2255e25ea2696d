import type { SourceSpan } from "@tessera/compiler";
import type { Position, Range } from "vscode-languageserver/lib/node/main.js";

/** Offset and position conversion for one version of a file */
export class LineIndex {
  readonly #text: string;
  readonly #starts: number[];

  constructor(text: string) {
    this.#text = text;
    this.#starts = [0];
    for (let index = 0; index < text.length; index += 1) {
      if (text[index] === "\n") {
        this.#starts.push(index + 1);
      }
    }
  }

  get lineCount(): number {
    return this.#starts.length;
  }

  positionAt(offset: number): Position {
    const clamped = Math.max(0, Math.min(offset, this.#text.length));
    let low = 0;
    let high = this.#starts.length - 1;

    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if ((this.#starts[mid] ?? 0) <= clamped) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    return { line: low, character: clamped - (this.#starts[low] ?? 0) };
  }

  offsetAt(position: Position): number {
    if (position.line < 0) return 0;
    if (position.line >= this.#starts.length) return this.#text.length;
    const lineStart = this.#starts[position.line] ?? 0;
    const lineEnd = this.#starts[position.line + 1] ?? this.#text.length + 1;
    const offset = lineStart + Math.max(0, position.character);
    return Math.min(offset, lineEnd - 1, this.#text.length);
  }

  range(start: number, end: number): Range {
    const clampedStart = Math.max(0, Math.min(start, this.#text.length));
    const clampedEnd = Math.max(clampedStart, Math.min(end, this.#text.length));

    return {
      start: this.positionAt(clampedStart),
      end: this.positionAt(clampedEnd),
    };
  }
}

export const spanRange = ({
  span,
  lineIndex,
}: {
  span: SourceSpan;
  lineIndex: LineIndex | undefined;
}): Range | undefined => {
  if (!lineIndex) {
    return undefined;
  }

  return lineIndex.range(span.start, span.end);
};
