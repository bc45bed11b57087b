import type { CorpusCountConfig } from "../config";
import type { Readable } from "node:stream";
import { openCorpus, readLines, releaseCorpus } from "../io/corpus";
import { openSink, type CountSink } from "../io/sinks";
import { countCorpusTokens, rankCorpusCounts } from "../nlp/corpusCounts";
import { stripExt, writeOutputs } from "../export/exporters";

export type Logger = Pick<typeof console, "log" | "warn">;

export type CorpusCountSummary = {
  tokens: number;          // token occurrences in the corpus
  distinctTokens: number;
  listedTokens: number;    // rows written to the token sink
  ngrams: number | null;   // rows written to the n-gram sink
  exported: string[];      // extra files from --formats
};

/**
 * Reads the corpus once, then writes ranked token counts and, when an n-gram
 * file is configured, ranked n-gram counts. Every sink is opened before the
 * corpus is read so that a bad output path fails without doing the work.
 */
export async function runCorpusCount(
  config: CorpusCountConfig,
  opts: { logger?: Logger } = {}
): Promise<CorpusCountSummary> {
  const logger = opts.logger ?? console;

  let tokenSink: CountSink | undefined;
  let corpus: Readable | undefined;
  let ngramSink: CountSink | null = null;

  try {
    tokenSink = await openSink(config.tokenCounts, "token counts");
    corpus = await openCorpus(config.corpus);
    ngramSink =
      config.ngramCounts === undefined ? null : await openSink(config.ngramCounts, "ngram counts");

    const tokenCounts = await countCorpusTokens(readLines(corpus));
    logger.log(`Read ${tokenCounts.total} tokens (${tokenCounts.size} distinct) from ${config.corpus ?? "stdin"}`);

    const counts = rankCorpusCounts(tokenCounts, {
      tokenMin: config.tokenMin,
      ngramMin: config.ngramMin,
      filterFirst: config.filterFirst,
      ngrams: ngramSink ? { minN: config.minN, maxN: config.maxN, bracket: config.bracket } : undefined,
    });

    await tokenSink.write(counts.tokens);
    await tokenSink.close();

    if (ngramSink && counts.ngrams) {
      await ngramSink.write(counts.ngrams);
      await ngramSink.close();
    }

    const exported: string[] = [];
    if (config.formats.length > 0 && config.tokenCounts !== undefined) {
      exported.push(
        ...writeOutputs({
          outBasePathNoExt: stripExt(config.tokenCounts),
          formats: config.formats,
          rows: counts.tokens,
          sheetName: "tokens",
        })
      );
      if (config.ngramCounts !== undefined && counts.ngrams) {
        exported.push(
          ...writeOutputs({
            outBasePathNoExt: stripExt(config.ngramCounts),
            formats: config.formats,
            rows: counts.ngrams,
            sheetName: "ngrams",
          })
        );
      }
      logger.log(`Wrote formats [${config.formats.join(", ")}]: ${exported.join(", ")}`);
    }

    const ngramNote = counts.ngrams ? ` -> ${counts.ngrams.length} n-grams` : "";
    logger.log(`Counted ${counts.tokens.length} tokens${ngramNote}`);

    return {
      tokens: tokenCounts.total,
      distinctTokens: tokenCounts.size,
      listedTokens: counts.tokens.length,
      ngrams: counts.ngrams ? counts.ngrams.length : null,
      exported,
    };
  } finally {
    // whatever was opened before a failure
    tokenSink?.release();
    ngramSink?.release();
    if (corpus) releaseCorpus(corpus);
  }
}
