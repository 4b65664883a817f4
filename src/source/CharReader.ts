import { ScriptReadError } from "../errors";

/**
 * A script as a stream of characters (Unicode code points) with bounded lookahead.
 */
export interface CharSource {
  /** Consume and return the next character, or `undefined` once exhausted. */
  next(): string | undefined;
  /** Up to `n` upcoming characters, without consuming them. */
  peek(n: number): string;
}

/**
 * CharSource over an iterator of text chunks.
 *
 * Characters pulled from the chunks but not yet consumed sit in `ahead`;
 * `peek(n)` only ever pulls enough chunks to hold `n` of them.
 */
export class CharReader implements CharSource {
  private ahead: string[] = [];
  private pos = 0;
  private pendingHigh = "";
  private done = false;

  constructor(private readonly chunks: Iterator<string>) {}

  next(): string | undefined {
    if (!this.fill(1)) return undefined;
    const ch = this.ahead[this.pos];
    this.pos++;
    return ch;
  }

  peek(n: number): string {
    if (n <= 0) return "";
    this.fill(n);
    return this.ahead.slice(this.pos, this.pos + n).join("");
  }

  private fill(n: number): boolean {
    while (this.ahead.length - this.pos < n && !this.done) {
      this.pull();
    }
    return this.ahead.length - this.pos >= n;
  }

  private pull() {
    let res: IteratorResult<string>;
    try {
      res = this.chunks.next();
    } catch (e) {
      this.done = true;
      throw new ScriptReadError("failed to read SQL script", { cause: e });
    }

    // Drop what has been consumed; only the lookahead window survives a pull.
    if (this.pos > 0) {
      this.ahead = this.ahead.slice(this.pos);
      this.pos = 0;
    }

    if (res.done) {
      this.done = true;
      if (this.pendingHigh) this.ahead.push(this.pendingHigh);
      this.pendingHigh = "";
      return;
    }

    let text = this.pendingHigh + res.value;
    this.pendingHigh = "";

    // A surrogate pair split across chunks is completed by the next chunk.
    const last = text.charCodeAt(text.length - 1);
    if (last >= 0xd800 && last <= 0xdbff) {
      this.pendingHigh = text.slice(-1);
      text = text.slice(0, -1);
    }

    for (const ch of text) this.ahead.push(ch);
  }
}

export function charsOf(text: string): CharSource {
  return new CharReader([text][Symbol.iterator]());
}
