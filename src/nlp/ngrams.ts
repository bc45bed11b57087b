export type NgramRange = {
  minN: number;
  maxN: number;
};

/**
 * UTF-16 offsets at which each code point of `text` begins.
 * A surrogate pair occupies one entry; a lone surrogate counts as its own character.
 */
export function charOffsets(text: string): number[] {
  const offsets: number[] = [];
  let i = 0;
  while (i < text.length) {
    offsets.push(i);
    const cp = text.codePointAt(i) ?? 0;
    i += cp > 0xffff ? 2 : 1;
  }
  return offsets;
}

/** Number of n-grams `ngrams()` yields for a string of `charLength` characters. */
export function ngramCount(charLength: number, minN: number, maxN: number): number {
  let total = 0;
  for (let i = 0; charLength - i >= minN; i++) {
    total += Math.min(maxN, charLength - i) - minN + 1;
  }
  return total;
}

/**
 * Lazily walks every character n-gram of a string with a length in [minN, maxN].
 *
 * For each start character the n-grams are yielded longest first, then the start
 * moves one character forward. The cursor is a start index into the character
 * offsets plus the length of the next n-gram, so slices always fall on code point
 * boundaries. Emitted values are slices of the input; duplicates are not removed.
 *
 * An iterator is single pass: build a new one to walk the string again.
 */
export class NgramIterator implements IterableIterator<string> {
  private readonly offsets: number[];
  private start = 0;
  private len: number;

  constructor(
    private readonly text: string,
    private readonly minN: number,
    private readonly maxN: number,
  ) {
    if (!Number.isInteger(minN) || minN < 1) {
      throw new RangeError(`minN must be a positive integer, got ${minN}`);
    }
    if (!Number.isInteger(maxN) || maxN < minN) {
      throw new RangeError(`maxN must be an integer >= minN (${minN}), got ${maxN}`);
    }

    this.offsets = charOffsets(text);
    this.len = Math.min(maxN, this.offsets.length);
  }

  /** Characters from the current start to the end of the string. */
  private remaining(): number {
    return this.offsets.length - this.start;
  }

  /** N-grams still to come. */
  get pending(): number {
    if (this.remaining() < this.minN) return 0;
    const rest = ngramCount(this.remaining() - 1, this.minN, this.maxN);
    return Math.max(0, this.len - this.minN + 1) + rest;
  }

  next(): IteratorResult<string> {
    if (this.len < this.minN) {
      // current start exhausted: drop its leading character
      if (this.remaining() <= this.minN) {
        this.start = this.offsets.length;
        this.len = 0;
        return { done: true, value: undefined };
      }
      this.start++;
      this.len = Math.min(this.maxN, this.remaining());
    }

    const from = this.offsets[this.start];
    const to =
      this.len === this.remaining() ? this.text.length : this.offsets[this.start + this.len];
    this.len--;

    return { done: false, value: this.text.slice(from, to) };
  }

  [Symbol.iterator](): NgramIterator {
    return this;
  }
}

export function ngrams(text: string, minN: number, maxN: number): NgramIterator {
  return new NgramIterator(text, minN, maxN);
}

export function bracket(token: string): string {
  return `<${token}>`;
}
