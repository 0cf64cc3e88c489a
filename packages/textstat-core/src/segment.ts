import type { SymbolModel } from "./distribution";

export type SegmentResult = {
  words: string[];
  probability: number;
};

export type WordScorer = Pick<SymbolModel, "probability">;

/**
 * Viterbi segmentation of an unspaced string into the most probable word
 * sequence under a unigram word model. best[i] is the best probability of
 * text[0..i) and words[i] the last word of that split.
 */
export function segment(text: string, model: WordScorer): SegmentResult {
  const n = text.length;
  const best: number[] = [1, ...new Array<number>(n).fill(0)];
  const words: string[] = new Array<string>(n + 1).fill("");

  for (let i = 1; i <= n; i++) {
    // Starts run right to left: on an equal score the longer word replaces the shorter.
    for (let j = i - 1; j >= 0; j--) {
      const w = text.slice(j, i);
      const score = model.probability(w) * best[j];
      if (score >= best[i]) {
        best[i] = score;
        words[i] = w;
      }
    }
  }

  const sequence: string[] = [];
  for (let i = n; i > 0; i -= words[i].length) {
    sequence.push(words[i]);
  }
  sequence.reverse();
  return { words: sequence, probability: best[n] };
}
