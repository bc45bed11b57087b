import * as fs from "node:fs";
import * as path from "node:path";
import { once } from "node:events";
import type { Writable } from "node:stream";
import * as XLSX from "xlsx";
import type { CountRow } from "../nlp/frequency";

export const EXPORT_FORMATS = ["json", "csv", "xlsx", "ods"] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export function formatTsvLine(row: CountRow): string {
  return `${row.text}\t${row.count}\n`;
}

/** Writes one `text<TAB>count` line per row, waiting for the stream to drain when it asks. */
export async function writeTsv(out: Writable, rows: Iterable<CountRow>): Promise<void> {
  for (const row of rows) {
    if (out.write(formatTsvLine(row))) continue;
    // a stream that already failed never drains
    if (out.errored) throw out.errored;
    await once(out, "drain");
  }
}

// RFC 4180 quoting
function csvField(value: string | number): string {
  const s = String(value);
  return /[",\n\r]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

export function writeCsv(filePath: string, rows: CountRow[]) {
  const header = ["text", "count"];
  const lines = [
    header.join(","),
    ...rows.map((r) => [r.text, r.count].map(csvField).join(",")),
  ];
  fs.writeFileSync(filePath, lines.join("\n") + "\n", "utf8");
}

export function writeSpreadsheet(filePath: string, rows: CountRow[], sheetName = "counts") {
  const wb = XLSX.utils.book_new();
  const ws = XLSX.utils.json_to_sheet(rows, { header: ["text", "count"] });

  ws["!cols"] = [{ wch: 24 }, { wch: 10 }];

  XLSX.utils.book_append_sheet(wb, ws, sheetName);

  // book type follows the extension
  XLSX.writeFile(wb, filePath);
}

export function ensureDir(p: string) {
  fs.mkdirSync(p, { recursive: true });
}

export function withExt(basePathNoExt: string, ext: string) {
  return `${basePathNoExt}.${ext.replace(/^\./, "")}`;
}

/** `out/tokens.tsv` -> `out/tokens` */
export function stripExt(filePath: string) {
  const ext = path.extname(filePath);
  return ext ? filePath.slice(0, -ext.length) : filePath;
}

export function normalizeFormat(fmt: string) {
  const f = fmt.trim().toLowerCase();
  if (f === "excel") return "xlsx";
  if (f === "opendocument") return "ods";
  return f;
}

/** Writes `rows` once per format beside `outBasePathNoExt`; returns the paths written. */
export function writeOutputs(opts: {
  outBasePathNoExt: string; // e.g. out/tokens
  formats: readonly ExportFormat[];
  rows: CountRow[];
  sheetName?: string;
}): string[] {
  const { outBasePathNoExt, formats, rows, sheetName = "counts" } = opts;

  ensureDir(path.dirname(outBasePathNoExt));

  const written: string[] = [];
  for (const fmt of formats) {
    const file = withExt(outBasePathNoExt, fmt);
    switch (fmt) {
      case "json":
        fs.writeFileSync(file, JSON.stringify(rows, null, 2) + "\n", "utf8");
        break;
      case "csv":
        writeCsv(file, rows);
        break;
      case "xlsx":
      case "ods":
        writeSpreadsheet(file, rows, sheetName);
        break;
    }
    written.push(file);
  }
  return written;
}
