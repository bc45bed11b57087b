export { NgramIterator, ngrams, ngramCount, charOffsets, bracket, type NgramRange } from "./nlp/ngrams";
export { tokenize } from "./nlp/tokenize";
export { FrequencyCounter, countNgrams, type CountRow, type NgramCountOptions } from "./nlp/frequency";
export {
  countCorpusTokens,
  rankCorpusCounts,
  type CorpusCountOptions,
  type CorpusCounts,
  type NgramOptions,
} from "./nlp/corpusCounts";
export { rankCounts, compareCodePoints, compareRows } from "./export/sort";
export { formatTsvLine, writeTsv, writeOutputs, EXPORT_FORMATS, type ExportFormat } from "./export/exporters";
export { parseCommandLine, parseCliArgs, loadConfig, type CorpusCountConfig, type CliCommand } from "./config";
export { ConfigError, IoError } from "./errors";
export { runCorpusCount, type CorpusCountSummary, type Logger } from "./jobs/runCorpusCount";
