import { tokenize } from "./tokenize";
import { FrequencyCounter, countNgrams, type CountRow } from "./frequency";
import type { NgramRange } from "./ngrams";
import { rankCounts } from "../export/sort";

export type NgramOptions = NgramRange & {
  bracket?: boolean; // wrap tokens in < > first; default true
};

export type CorpusCountOptions = {
  tokenMin?: number;  // default 1
  ngramMin?: number;  // default 1
  // n-grams are only counted when set
  ngrams?: NgramOptions;
  // apply tokenMin before n-gram expansion
  filterFirst?: boolean;
};

export type CorpusCounts = {
  tokens: CountRow[];
  ngrams: CountRow[] | null;
};

export async function countCorpusTokens(
  lines: Iterable<string> | AsyncIterable<string>
): Promise<FrequencyCounter> {
  const counter = new FrequencyCounter();
  for await (const line of lines) {
    counter.addAll(tokenize(line));
  }
  return counter;
}

/**
 * Ranks token counts and, when n-grams are requested, expands the ranked tokens
 * into weighted n-gram counts.
 *
 * Token-only: tokenMin always filters the token list.
 * With n-grams and filterFirst: tokens below tokenMin are neither expanded nor listed.
 * With n-grams and no filterFirst: every token is expanded and listed, tokenMin is
 * not applied anywhere. This matches the counts existing consumers were built on,
 * surprising as it is.
 */
export function rankCorpusCounts(
  tokenCounts: Iterable<[string, number]>,
  opts: CorpusCountOptions = {}
): CorpusCounts {
  const tokenMin = opts.tokenMin ?? 1;
  const ngramMin = opts.ngramMin ?? 1;

  if (!opts.ngrams) {
    return { tokens: rankCounts(tokenCounts, tokenMin), ngrams: null };
  }

  const tokens = rankCounts(tokenCounts, opts.filterFirst ? tokenMin : undefined);
  const ngramCounts = countNgrams(tokens, opts.ngrams);

  return { tokens, ngrams: rankCounts(ngramCounts, ngramMin) };
}
