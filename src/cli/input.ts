import { readFile } from "node:fs/promises";

import type { TextSource } from "../core/types.js";
import { STDIN_NAME } from "../config.js";
import { OddwordError } from "../errors.js";

export type InputStream = AsyncIterable<string | Buffer | Uint8Array>;

/** Collects a stream into one buffer; the bytes are decoded later by the tokenizer. */
export async function readStream(stream: InputStream): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const c of stream) chunks.push(typeof c === "string" ? Buffer.from(c, "utf8") : Buffer.from(c));
  return Buffer.concat(chunks);
}

/**
 * Reads every input completely before anything is processed. With no files
 * the whole of `stdin` is one source named "<stdin>".
 */
export async function readSources(files: readonly string[], stdin: InputStream): Promise<TextSource[]> {
  if (files.length === 0) {
    try {
      return [{ name: STDIN_NAME, text: await readStream(stdin) }];
    } catch (err) {
      throw new OddwordError(`reading ${STDIN_NAME}: ${describe(err)}`, "INPUT_UNREADABLE", {
        operation: "readSources",
        file: STDIN_NAME,
      }, { cause: err instanceof Error ? err : undefined });
    }
  }

  const sources: TextSource[] = [];
  for (const file of files) {
    try {
      sources.push({ name: file, text: await readFile(file) });
    } catch (err) {
      throw new OddwordError(`open ${file}: ${describe(err)}`, "INPUT_UNREADABLE", {
        operation: "readSources",
        file,
      }, { cause: err instanceof Error ? err : undefined });
    }
  }
  return sources;
}

function describe(err: unknown): string {
  if (err instanceof Error && "code" in err && err.code === "ENOENT") return "no such file or directory";
  if (err instanceof Error && "code" in err && err.code === "EISDIR") return "is a directory";
  return err instanceof Error ? err.message : String(err);
}
