import { EmptyModelError } from "./errors";
import type { RandomSource } from "./random";

export type SymbolCount = {
  symbol: string;
  count: number;
};

/** The surface a scorer or segmenter needs from a trained model. */
export interface SymbolModel {
  probability(symbol: string): number;
  sample(random?: RandomSource): string;
  add(symbol: string): void;
}

type Sampler = {
  symbols: string[];
  cumulative: number[];
};

/**
 * Frequency counter over string symbols. Counts keep insertion order, which is
 * what `top` falls back on when two symbols have the same count.
 */
export class ProbabilityModel implements SymbolModel {
  readonly defaultProbability: number;
  private counts = new Map<string, number>();
  private totalCount = 0;
  private sampler: Sampler | null = null;

  constructor(observations: Iterable<string> = [], defaultProbability = 0) {
    this.defaultProbability = defaultProbability;
    for (const o of observations) this.add(o);
  }

  add(symbol: string): void {
    this.counts.set(symbol, (this.counts.get(symbol) ?? 0) + 1);
    this.totalCount += 1;
    this.sampler = null;
  }

  get total(): number {
    return this.totalCount;
  }

  count(symbol: string): number {
    return this.counts.get(symbol) ?? 0;
  }

  probability(symbol: string): number {
    const c = this.counts.get(symbol);
    if (c === undefined || this.totalCount === 0) return this.defaultProbability;
    return c / this.totalCount;
  }

  top(k: number): SymbolCount[] {
    // Array.prototype.sort is stable, so equal counts stay in insertion order.
    return [...this.counts.entries()]
      .map(([symbol, count]) => ({ symbol, count }))
      .sort((a, b) => b.count - a.count)
      .slice(0, Math.max(0, k));
  }

  sample(random: RandomSource = Math.random): string {
    if (this.totalCount === 0) throw new EmptyModelError();
    const sampler = this.sampler ?? this.buildSampler();
    const target = random() * this.totalCount;
    let lo = 0;
    let hi = sampler.cumulative.length - 1;
    while (lo < hi) {
      const mid = (lo + hi) >> 1;
      if (sampler.cumulative[mid] > target) hi = mid;
      else lo = mid + 1;
    }
    return sampler.symbols[lo];
  }

  samples(k: number, random: RandomSource = Math.random): string[] {
    const out: string[] = [];
    for (let i = 0; i < k; i++) out.push(this.sample(random));
    return out;
  }

  private buildSampler(): Sampler {
    const symbols: string[] = [];
    const cumulative: number[] = [];
    let acc = 0;
    for (const [symbol, count] of this.counts) {
      acc += count;
      symbols.push(symbol);
      cumulative.push(acc);
    }
    this.sampler = { symbols, cumulative };
    return this.sampler;
  }
}
