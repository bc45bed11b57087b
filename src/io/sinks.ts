import * as fs from "node:fs";
import { once } from "node:events";
import { finished } from "node:stream/promises";
import type { Writable } from "node:stream";
import { IoError } from "../errors";
import { writeTsv } from "../export/exporters";
import type { CountRow } from "../nlp/frequency";

/** Destination of one ranked list, as `text<TAB>count` lines. */
export interface CountSink {
  /** File path, or "stdout". */
  readonly target: string;
  write(rows: Iterable<CountRow>): Promise<void>;
  /** Flushes and, for files, closes. Reports any write failure seen so far. */
  close(): Promise<void>;
  /** Drops an owned stream without flushing; no-op once closed and for stdout. */
  release(): void;
}

export class StreamSink implements CountSink {
  private failure: Error | null = null;

  constructor(
    readonly target: string,
    private readonly out: Writable,
    private readonly what: string,
    private readonly ownsStream: boolean
  ) {
    out.on("error", (err) => {
      this.failure ??= err;
    });
  }

  async write(rows: Iterable<CountRow>): Promise<void> {
    this.throwIfFailed();
    try {
      await writeTsv(this.out, rows);
    } catch (err) {
      throw new IoError(`Can't write ${this.what} to ${this.target}`, err);
    }
  }

  async close(): Promise<void> {
    this.throwIfFailed();
    try {
      if (this.ownsStream) {
        this.out.end();
        await finished(this.out);
      } else {
        await new Promise<void>((resolve, reject) => {
          this.out.write("", (err) => (err ? reject(err) : resolve()));
        });
      }
    } catch (err) {
      throw new IoError(`Can't write ${this.what} to ${this.target}`, err);
    }
    this.throwIfFailed();
  }

  release(): void {
    if (this.ownsStream && !this.out.destroyed) this.out.destroy();
  }

  private throwIfFailed(): void {
    if (this.failure) throw new IoError(`Can't write ${this.what} to ${this.target}`, this.failure);
  }
}

/**
 * Creates (truncating) the file at `filePath`, or wraps stdout when no path is given.
 * `what` names the contents in error messages, e.g. "token counts".
 */
export async function openSink(filePath: string | undefined, what: string): Promise<CountSink> {
  if (filePath === undefined) return new StreamSink("stdout", process.stdout, what, false);

  const out = fs.createWriteStream(filePath);
  try {
    await once(out, "open");
  } catch (err) {
    throw new IoError(`Can't create file to write ${what}: ${filePath}`, err);
  }
  return new StreamSink(filePath, out, what, true);
}
