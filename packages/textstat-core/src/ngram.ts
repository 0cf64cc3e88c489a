import { BOUNDARY } from "./config";
import { ProbabilityModel } from "./distribution";
import { UnseenContextError } from "./errors";
import type { RandomSource } from "./random";

export type TokenMode = "word" | "char";

/**
 * A tuple as an array of tokens. A string is read as its characters in "char"
 * mode ("th") and as a single token in "word" mode.
 */
export type Gram = string | readonly string[];

// Word-mode tuple keys join tokens on a character no token may contain.
const WORD_SEPARATOR = "\u0000";

export type NgramOptions = {
  n: number;
  mode?: TokenMode;
  defaultProbability?: number;
};

export type GramCount = {
  tuple: string[];
  count: number;
};

/**
 * Counts n-tuples and, for n > 1, the conditional table prefix -> next token.
 * In "char" mode every observation is a word and its characters are the
 * tokens; for n > 1 each word is read with a leading boundary marker so the
 * model learns how words start.
 */
export class NgramModel {
  readonly n: number;
  readonly mode: TokenMode;
  readonly defaultProbability: number;
  private tuples: ProbabilityModel;
  private cond = new Map<string, ProbabilityModel>();

  constructor(options: NgramOptions, observations: readonly string[] = []) {
    if (!Number.isInteger(options.n) || options.n < 1) {
      throw new RangeError(`n must be a positive integer, got ${options.n}`);
    }
    this.n = options.n;
    this.mode = options.mode ?? "word";
    this.defaultProbability = options.defaultProbability ?? 0;
    this.tuples = new ProbabilityModel([], this.defaultProbability);
    this.addSequence(observations);
  }

  add(gram: Gram): void {
    const tuple = this.split(gram);
    if (tuple.length !== this.n) {
      throw new RangeError(`expected a ${this.n}-tuple, got ${tuple.length} tokens`);
    }
    this.tuples.add(this.join(tuple));
    if (this.n === 1) return;
    const prefix = this.join(tuple.slice(0, -1));
    let row = this.cond.get(prefix);
    if (!row) {
      row = new ProbabilityModel([], this.defaultProbability);
      this.cond.set(prefix, row);
    }
    row.add(tuple[tuple.length - 1]);
  }

  addSequence(observations: readonly string[]): void {
    if (this.mode === "word") {
      this.addWindowed(observations);
      return;
    }
    for (const word of observations) {
      this.addWindowed(this.n === 1 ? [...word] : [...(BOUNDARY + word)]);
    }
  }

  get total(): number {
    return this.tuples.total;
  }

  count(gram: Gram): number {
    return this.tuples.count(this.key(gram));
  }

  probability(gram: Gram): number {
    return this.tuples.probability(this.key(gram));
  }

  top(k: number): GramCount[] {
    return this.tuples.top(k).map(({ symbol, count }) => ({ tuple: this.fromKey(symbol), count }));
  }

  sample(random: RandomSource = Math.random): string[] {
    return this.fromKey(this.tuples.sample(random));
  }

  hasContext(prefix: Gram): boolean {
    return this.cond.has(this.key(prefix));
  }

  conditional(prefix: Gram): ProbabilityModel {
    const row = this.cond.get(this.key(prefix));
    if (!row) throw new UnseenContextError(this.split(prefix));
    return row;
  }

  conditionalProbability(prefix: Gram, next: string): number {
    const row = this.cond.get(this.key(prefix));
    return row ? row.probability(next) : this.defaultProbability;
  }

  generate(length: number, random: RandomSource = Math.random): string[] {
    if (!Number.isInteger(length) || length < 0) {
      throw new RangeError(`length must be a non-negative integer, got ${length}`);
    }
    if (length === 0) return [];
    if (this.n === 1) return this.tuples.samples(length, random);
    const out = this.sample(random);
    if (length < this.n) return out.slice(0, length);
    while (out.length < length) {
      out.push(this.conditional(out.slice(out.length - this.n + 1)).sample(random));
    }
    return out;
  }

  text(length: number, random: RandomSource = Math.random): string {
    return this.generate(length, random).join(this.mode === "word" ? " " : "");
  }

  private addWindowed(tokens: readonly string[]): void {
    for (let i = 0; i + this.n <= tokens.length; i++) {
      this.add(tokens.slice(i, i + this.n));
    }
  }

  private key(gram: Gram): string {
    return this.join(this.split(gram));
  }

  private join(tokens: readonly string[]): string {
    return tokens.join(this.mode === "word" ? WORD_SEPARATOR : "");
  }

  private fromKey(key: string): string[] {
    return this.mode === "word" ? key.split(WORD_SEPARATOR) : [...key];
  }

  private split(gram: Gram): string[] {
    const tokens = typeof gram === "string" ? (this.mode === "char" ? [...gram] : [gram]) : [...gram];
    for (const token of tokens) {
      if (this.mode === "word" && token.includes(WORD_SEPARATOR)) {
        throw new RangeError(`word tokens may not contain U+0000: ${JSON.stringify(token)}`);
      }
      if (this.mode === "char" && [...token].length !== 1) {
        throw new RangeError(`char tokens must be single characters, got ${JSON.stringify(token)}`);
      }
    }
    return tokens;
  }
}

/** The n = 1 case: no conditional table. */
export type UnigramModel = NgramModel;

export function unigramWordModel(words: readonly string[], defaultProbability = 0): UnigramModel {
  return new NgramModel({ n: 1, mode: "word", defaultProbability }, words);
}

export function unigramCharModel(words: readonly string[], defaultProbability = 0): UnigramModel {
  return new NgramModel({ n: 1, mode: "char", defaultProbability }, words);
}

export function ngramWordModel(n: number, words: readonly string[], defaultProbability = 0): NgramModel {
  return new NgramModel({ n, mode: "word", defaultProbability }, words);
}

export function ngramCharModel(n: number, words: readonly string[], defaultProbability = 0): NgramModel {
  return new NgramModel({ n, mode: "char", defaultProbability }, words);
}
