import { charsOf, type CharSource } from "./source/CharReader";

/** Longest `$tag$` the scanner will look for after an opening `$`. */
export const DOLLAR_TAG_WINDOW = 64;

export type LexerState =
  | { kind: "normal" }
  | { kind: "lineComment" }
  | { kind: "blockComment" }
  | { kind: "singleQuoted" }
  | { kind: "doubleQuoted" }
  | { kind: "dollarQuoted"; tag: string };

const NORMAL: LexerState = { kind: "normal" };

export type Step = { state: LexerState; text: string; boundary?: boolean };

/**
 * Split a script into statements on `;`.
 *
 * A semicolon only ends a statement outside quotes, comments and
 * dollar-quoted bodies. Each statement is trimmed and blank ones are dropped;
 * comments stay with the statement they precede. Unterminated quotes or
 * comments at end of input are not an error: whatever was scanned becomes the
 * last statement.
 *
 * Throws ScriptReadError only when the underlying source fails to read.
 */
export function splitSqlStatements(input: string | CharSource): string[] {
  const src = typeof input === "string" ? charsOf(input) : input;
  const stmts: string[] = [];
  let buf = "";

  const flush = () => {
    const s = buf.trim();
    buf = "";
    if (s) stmts.push(s);
  };

  let state: LexerState = NORMAL;
  for (let ch = src.next(); ch !== undefined; ch = src.next()) {
    const step = scan(state, ch, src);
    state = step.state;
    if (step.boundary) {
      flush();
      continue;
    }
    buf += step.text;
  }

  flush();
  return stmts;
}

/** One transition. Consumes any lookahead it appends from `src`. */
export function scan(state: LexerState, ch: string, src: CharSource): Step {
  switch (state.kind) {
    case "lineComment":
      return { state: ch === "\n" ? NORMAL : state, text: ch };

    case "blockComment":
      if (ch === "*" && src.peek(1) === "/") {
        return { state: NORMAL, text: ch + take(src, 1) };
      }
      return { state, text: ch };

    case "singleQuoted":
      return { state: ch === "'" ? NORMAL : state, text: ch };

    case "doubleQuoted":
      return { state: ch === '"' ? NORMAL : state, text: ch };

    case "dollarQuoted": {
      if (ch !== "$") return { state, text: ch };
      const rest = state.tag.slice(1);
      const n = codePoints(rest);
      if (src.peek(n) !== rest) return { state, text: ch };
      return { state: NORMAL, text: ch + take(src, n) };
    }

    case "normal":
      return scanNormal(ch, src);
  }
}

function scanNormal(ch: string, src: CharSource): Step {
  if (ch === "-" && src.peek(1) === "-") {
    return { state: { kind: "lineComment" }, text: ch + take(src, 1) };
  }
  if (ch === "/" && src.peek(1) === "*") {
    return { state: { kind: "blockComment" }, text: ch + take(src, 1) };
  }
  if (ch === "$") {
    const tag = detectDollarTag(src);
    if (tag) {
      return { state: { kind: "dollarQuoted", tag }, text: ch + take(src, codePoints(tag) - 1) };
    }
    return { state: NORMAL, text: ch };
  }
  if (ch === "'") return { state: { kind: "singleQuoted" }, text: ch };
  if (ch === '"') return { state: { kind: "doubleQuoted" }, text: ch };
  if (ch === ";") return { state: NORMAL, text: "", boundary: true };
  return { state: NORMAL, text: ch };
}

/**
 * Called just after an opening `$` was consumed. Returns the full tag
 * (`$$`, `$body$`, ...) or `undefined` when no closing `$` comes before
 * whitespace or the end of the window.
 */
function detectDollarTag(src: CharSource): string | undefined {
  let tag = "$";
  for (const r of src.peek(DOLLAR_TAG_WINDOW)) {
    tag += r;
    if (r === "$") return tag;
    if (r === " " || r === "\n" || r === "\t") return undefined;
  }
  return undefined;
}

/** Length in the unit `CharSource` counts in. */
function codePoints(s: string): number {
  return [...s].length;
}

function take(src: CharSource, n: number): string {
  let out = "";
  for (let i = 0; i < n; i++) {
    const ch = src.next();
    if (ch === undefined) break;
    out += ch;
  }
  return out;
}
