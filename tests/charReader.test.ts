import { mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ScriptReadError } from "../src/errors";
import { CharReader, charsOf } from "../src/source/CharReader";
import { fileChunks, readScriptFile } from "../src/source/readScriptFile";
import { splitSqlStatements } from "../src/sqlSplit";

function readAll(src: { next(): string | undefined }): string[] {
  const out: string[] = [];
  for (let ch = src.next(); ch !== undefined; ch = src.next()) out.push(ch);
  return out;
}

describe("CharReader", () => {
  it("peeks without consuming", () => {
    const src = charsOf("abc");
    expect(src.peek(2)).toBe("ab");
    expect(src.next()).toBe("a");
    expect(src.peek(5)).toBe("bc");
    expect(src.peek(0)).toBe("");
    expect(readAll(src)).toEqual(["b", "c"]);
    expect(src.next()).toBeUndefined();
    expect(src.peek(1)).toBe("");
  });

  it("peeks across chunks", () => {
    const src = new CharReader(["a", "", "bc", "d"][Symbol.iterator]());
    expect(src.peek(3)).toBe("abc");
    expect(readAll(src)).toEqual(["a", "b", "c", "d"]);
  });

  it("rejoins a surrogate pair split between chunks", () => {
    const src = new CharReader(["a\uD83D", "\uDE00b"][Symbol.iterator]());
    expect(readAll(src)).toEqual(["a", "😀", "b"]);
  });

  it("wraps iterator failures in ScriptReadError", () => {
    const src = new CharReader({
      next(): IteratorResult<string> {
        throw new Error("EIO");
      },
    });
    expect(() => src.next()).toThrow(ScriptReadError);
  });
});

describe("readScriptFile", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), "sqlbatch-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("decodes UTF-8 across small chunks", async () => {
    const file = path.join(dir, "script.sql");
    await writeFile(file, "select 'é';\nselect '😀';\n", "utf8");

    expect([...fileChunks(file, 1)].join("")).toBe("select 'é';\nselect '😀';\n");
    expect(splitSqlStatements(readScriptFile(file, 3))).toEqual(["select 'é'", "select '😀'"]);
  });

  it("strips a leading byte order mark", async () => {
    const file = path.join(dir, "bom.sql");
    await writeFile(file, "\uFEFFselect 1;", "utf8");

    expect(splitSqlStatements(readScriptFile(file))).toEqual(["select 1"]);
  });

  it("reports a missing file as ScriptReadError", () => {
    const src = readScriptFile(path.join(dir, "missing", "x.sql"));
    expect(() => splitSqlStatements(src)).toThrow(ScriptReadError);
  });
});
