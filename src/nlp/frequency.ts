import { bracket, ngrams, type NgramRange } from "./ngrams";

export type CountRow = {
  text: string;  // token or n-gram
  count: number; // aggregated occurrences
};

/**
 * Accumulates weighted occurrence counts per string.
 * Iteration order is insertion order and carries no meaning; rank before output.
 */
export class FrequencyCounter {
  private readonly counts = new Map<string, number>();
  private sum = 0;

  add(key: string, weight = 1): void {
    this.counts.set(key, (this.counts.get(key) ?? 0) + weight);
    this.sum += weight;
  }

  addAll(keys: Iterable<string>, weight = 1): void {
    for (const key of keys) this.add(key, weight);
  }

  get(key: string): number {
    return this.counts.get(key) ?? 0;
  }

  /** Distinct keys. */
  get size(): number {
    return this.counts.size;
  }

  /** Sum of all weights added. */
  get total(): number {
    return this.sum;
  }

  entries(): IterableIterator<[string, number]> {
    return this.counts.entries();
  }

  [Symbol.iterator](): IterableIterator<[string, number]> {
    return this.counts.entries();
  }

  toMap(): Map<string, number> {
    return new Map(this.counts);
  }
}

export type NgramCountOptions = NgramRange & {
  bracket?: boolean; // default true
};

/**
 * Expands every token into its character n-grams and credits each n-gram
 * with the token's full count.
 */
export function countNgrams(tokens: Iterable<CountRow>, opts: NgramCountOptions): FrequencyCounter {
  const useBrackets = opts.bracket ?? true;
  const counter = new FrequencyCounter();

  for (const { text, count } of tokens) {
    const source = useBrackets ? bracket(text) : text;
    counter.addAll(ngrams(source, opts.minN, opts.maxN), count);
  }

  return counter;
}
