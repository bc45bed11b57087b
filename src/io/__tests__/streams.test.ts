import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { Readable, Writable } from "node:stream";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { IoError } from "../../errors";
import { openCorpus, readLines, releaseCorpus } from "../corpus";
import { StreamSink, openSink } from "../sinks";

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), "corpus-count-io-"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

async function collect(lines: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const line of lines) out.push(line);
  return out;
}

describe("corpus", () => {
  it("reads lines across chunk boundaries and CRLF endings", async () => {
    const input = Readable.from(["a b\nc", "d\r\ne\n"]);
    expect(await collect(readLines(input))).toEqual(["a b", "cd", "e"]);
  });

  it("reads a corpus file", async () => {
    const file = path.join(dir, "corpus.txt");
    fs.writeFileSync(file, "one two\nthree");
    expect(await collect(readLines(await openCorpus(file)))).toEqual(["one two", "three"]);
  });

  it("releases an opened corpus file but never stdin", async () => {
    const file = path.join(dir, "corpus.txt");
    fs.writeFileSync(file, "one");
    const input = await openCorpus(file);

    releaseCorpus(input);
    expect(input.destroyed).toBe(true);

    releaseCorpus(process.stdin);
    expect(process.stdin.destroyed).toBe(false);
  });

  it("fails to open a missing corpus", async () => {
    const missing = path.join(dir, "missing.txt");
    await expect(openCorpus(missing)).rejects.toBeInstanceOf(IoError);
    await expect(openCorpus(missing)).rejects.toThrow(`Can't open corpus for reading: ${missing}`);
  });
});

describe("sinks", () => {
  it("writes tsv lines to a file", async () => {
    const file = path.join(dir, "tokens.tsv");
    const sink = await openSink(file, "token counts");
    await sink.write([
      { text: "a", count: 2 },
      { text: "b", count: 1 },
    ]);
    await sink.close();

    expect(sink.target).toBe(file);
    expect(fs.readFileSync(file, "utf8")).toBe("a\t2\nb\t1\n");
  });

  it("fails to create a file in a missing directory", async () => {
    const file = path.join(dir, "no-such-dir", "tokens.tsv");
    await expect(openSink(file, "token counts")).rejects.toThrow(
      `Can't create file to write token counts: ${file}`
    );
  });

  it("releases an owned stream without flushing it", async () => {
    const out = fs.createWriteStream(path.join(dir, "tokens.tsv"));
    const borrowed = new Writable({ write: (_chunk, _enc, cb) => cb() });

    new StreamSink("file", out, "token counts", true).release();
    new StreamSink("stdout", borrowed, "token counts", false).release();

    expect(out.destroyed).toBe(true);
    expect(borrowed.destroyed).toBe(false);
  });

  it("leaves nothing to release after a close", async () => {
    const file = path.join(dir, "tokens.tsv");
    const sink = await openSink(file, "token counts");
    await sink.write([{ text: "a", count: 1 }]);
    await sink.close();
    sink.release();

    expect(fs.readFileSync(file, "utf8")).toBe("a\t1\n");
  });

  it("reports a failed write", async () => {
    const failing = new Writable({
      write(_chunk, _enc, cb) {
        cb(new Error("disk full"));
      },
    });
    const sink = new StreamSink("mem", failing, "token counts", true);

    const run = async () => {
      await sink.write([{ text: "a", count: 1 }]);
      await sink.close();
    };
    await expect(run()).rejects.toThrow("Can't write token counts to mem: disk full");
  });
});
