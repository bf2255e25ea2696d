export class CharStream {
  readonly text: string;
  readonly end: number;
  readonly location = {
    index: 0,
  };

  constructor(text: string, { start = 0, end }: { start?: number; end?: number } = {}) {
    this.text = text;
    this.end = Math.min(end ?? text.length, text.length);
    this.location.index = start;
  }

  /** Current offset into the underlying text */
  get position() {
    return this.location.index;
  }

  get hasCharacters() {
    return this.position < this.end;
  }

  get next(): string | undefined {
    return this.at(0);
  }

  at(index: number): string | undefined {
    const target = this.position + index;
    return target < this.end ? this.text[target] : undefined;
  }

  startsWith(value: string): boolean {
    return (
      this.position + value.length <= this.end &&
      this.text.startsWith(value, this.position)
    );
  }

  /** Returns the next character and advances past it */
  consumeChar(): string {
    const char = this.next;
    if (char === undefined) {
      throw new Error("Out of characters");
    }

    this.location.index += 1;
    return char;
  }

  consumeWhile(predicate: (char: string) => boolean): string {
    const start = this.position;
    while (this.hasCharacters && predicate(this.text[this.position])) {
      this.location.index += 1;
    }
    return this.text.slice(start, this.position);
  }
}
