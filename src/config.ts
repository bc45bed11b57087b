import { z } from "zod";
import { ConfigError } from "./errors";
import { EXPORT_FORMATS, normalizeFormat } from "./export/exporters";

export const VERSION = "0.1.0";

export const USAGE = `corpus-count ${VERSION}
Count tokens and character n-grams in a whitespace-tokenized corpus.

Usage: corpus-count [options]

  -c, --corpus <path>        corpus file (default: stdin)
  -t, --token_counts <path>  token count file (default: stdout)
  -n, --ngram_counts <path>  file for n-gram counts; n-grams are only counted when set
      --token_min <n>        minimum token count (default: 1)
      --ngram_min <n>        minimum n-gram count (default: 1)
      --min_n <n>            minimum n-gram length (default: 3)
      --max_n <n>            maximum n-gram length (default: 6)
      --filter_first         filter tokens by --token_min before counting n-grams
      --no_bracket           do not wrap tokens in < > before extracting n-grams
      --formats <list>       also export ranked counts as json,csv,xlsx,ods
  -h, --help                 print this help
  -V, --version              print the version
`;

type ValueKey =
  | "corpus"
  | "tokenCounts"
  | "ngramCounts"
  | "tokenMin"
  | "ngramMin"
  | "minN"
  | "maxN"
  | "formats";

type SwitchKey = "filterFirst" | "noBracket" | "help" | "version";

export type RawArgs = Partial<Record<ValueKey, string>> & Record<SwitchKey, boolean>;

const VALUE_FLAGS = new Map<string, ValueKey>([
  ["-c", "corpus"],
  ["--corpus", "corpus"],
  ["-t", "tokenCounts"],
  ["--token_counts", "tokenCounts"],
  ["-n", "ngramCounts"],
  ["--ngram_counts", "ngramCounts"],
  ["--token_min", "tokenMin"],
  ["--ngram_min", "ngramMin"],
  ["--min_n", "minN"],
  ["--max_n", "maxN"],
  ["--formats", "formats"],
]);

const SWITCHES = new Map<string, SwitchKey>([
  ["--filter_first", "filterFirst"],
  ["--no_bracket", "noBracket"],
  ["-h", "help"],
  ["--help", "help"],
  ["-V", "version"],
  ["--version", "version"],
]);

const FLAG_NAMES: Record<string, string> = {
  corpus: "--corpus",
  tokenCounts: "--token_counts",
  ngramCounts: "--ngram_counts",
  tokenMin: "--token_min",
  ngramMin: "--ngram_min",
  minN: "--min_n",
  maxN: "--max_n",
  formats: "--formats",
};

/** Collects flag values as written; nothing is converted or checked here. */
export function parseCliArgs(argv: string[]): RawArgs {
  const raw: RawArgs = { filterFirst: false, noBracket: false, help: false, version: false };
  const unknown: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const name = eq === -1 ? arg : arg.slice(0, eq);

    const key = VALUE_FLAGS.get(name);
    if (key) {
      const value = eq !== -1 ? arg.slice(eq + 1) : i + 1 < argv.length ? argv[++i] : undefined;
      if (value === undefined) throw new ConfigError(`Missing value for ${name}`);
      raw[key] = value;
      continue;
    }

    const sw = SWITCHES.get(name);
    if (sw && eq === -1) {
      raw[sw] = true;
      continue;
    }

    unknown.push(arg);
  }

  if (unknown.length > 0) {
    throw new ConfigError("Unknown arguments:", unknown);
  }
  return raw;
}

function count(fallback: number) {
  return z
    .string()
    .regex(/^\d+$/, "expected a non-negative integer")
    .default(String(fallback))
    .transform(Number)
    .pipe(z.number().refine(Number.isSafeInteger, `must be at most ${Number.MAX_SAFE_INTEGER}`));
}

const path = z.string().min(1, "path must not be empty").optional();

const ConfigSchema = z
  .object({
    corpus: path,
    tokenCounts: path,
    ngramCounts: path,
    tokenMin: count(1),
    ngramMin: count(1),
    minN: count(3).pipe(z.number().min(1, "The minimum n-gram length cannot be zero.")),
    maxN: count(6),
    filterFirst: z.boolean(),
    noBracket: z.boolean(),
    formats: z
      .string()
      .default("")
      .transform((s) =>
        s
          .split(",")
          .map(normalizeFormat)
          .filter((f) => f.length > 0)
      )
      .pipe(z.array(z.enum(EXPORT_FORMATS))),
  })
  .superRefine((c, ctx) => {
    // field issues leave unconverted values behind; only compare real numbers
    if (Number.isInteger(c.minN) && Number.isInteger(c.maxN) && c.minN > c.maxN) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["maxN"],
        message: "The maximum length should be equal to or greater than the minimum length.",
      });
    }
    if (c.formats.length > 0 && c.tokenCounts === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["formats"],
        message: "requires --token_counts <path>",
      });
    }
  })
  .transform(({ noBracket, ...rest }) => ({ ...rest, bracket: !noBracket }));

export type CorpusCountConfig = z.infer<typeof ConfigSchema>;

export type CliCommand =
  | { kind: "run"; config: CorpusCountConfig }
  | { kind: "help" }
  | { kind: "version" };

function describeIssue(issue: z.ZodIssue): string {
  const key = issue.path[0];
  const flag = typeof key === "string" ? FLAG_NAMES[key] ?? key : undefined;
  return flag ? `${flag}: ${issue.message}` : issue.message;
}

export function loadConfig(raw: RawArgs): CorpusCountConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError("Invalid arguments:", result.error.issues.map(describeIssue));
  }
  return result.data;
}

export function parseCommandLine(argv: string[]): CliCommand {
  const raw = parseCliArgs(argv);
  if (raw.help) return { kind: "help" };
  if (raw.version) return { kind: "version" };
  return { kind: "run", config: loadConfig(raw) };
}
