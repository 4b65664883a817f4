import { closeSync, openSync, readSync } from "node:fs";
import { TextDecoder } from "node:util";

import { CharReader, type CharSource } from "./CharReader";

const DEFAULT_CHUNK_SIZE = 64 * 1024;

/**
 * Reads a UTF-8 file lazily in fixed-size chunks.
 * Multi-byte sequences cut by a chunk boundary are held back by the decoder.
 */
export function* fileChunks(path: string, chunkSize = DEFAULT_CHUNK_SIZE): Generator<string> {
  const decoder = new TextDecoder("utf-8", { fatal: false, ignoreBOM: false });
  const buf = Buffer.alloc(chunkSize);
  const fd = openSync(path, "r");
  try {
    for (;;) {
      const n = readSync(fd, buf, 0, chunkSize, null);
      if (n === 0) break;
      const text = decoder.decode(buf.subarray(0, n), { stream: true });
      if (text) yield text;
    }
    const tail = decoder.decode();
    if (tail) yield tail;
  } finally {
    closeSync(fd);
  }
}

export function readScriptFile(path: string, chunkSize?: number): CharSource {
  return new CharReader(fileChunks(path, chunkSize));
}

