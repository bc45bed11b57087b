import * as fs from "node:fs";
import * as readline from "node:readline";
import { once } from "node:events";
import type { Readable } from "node:stream";
import { IoError } from "../errors";

/** Opens the corpus file, or stdin when no path is given. Fails before any line is read. */
export async function openCorpus(filePath?: string): Promise<Readable> {
  if (filePath === undefined) return process.stdin;

  const stream = fs.createReadStream(filePath);
  try {
    await once(stream, "open");
  } catch (err) {
    throw new IoError(`Can't open corpus for reading: ${filePath}`, err);
  }
  return stream;
}

/** Closes a corpus opened by `openCorpus`; stdin is left alone. */
export function releaseCorpus(input: Readable): void {
  if (input !== process.stdin && !input.destroyed) input.destroy();
}

/** Lines of a UTF-8 stream without their terminators (\n or \r\n). */
export async function* readLines(input: Readable): AsyncGenerator<string> {
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of rl) yield line;
  } catch (err) {
    throw new IoError("Can't read line", err);
  } finally {
    rl.close();
  }
}
