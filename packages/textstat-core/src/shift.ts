import { allShifts } from "./cipher";
import { SHIFT_UNSEEN_PROBABILITY } from "./config";
import { ProbabilityModel } from "./distribution";
import { bigrams, canonicalize } from "./tokenizer";

export type ShiftDecoderOptions = {
  unseenProbability?: number;
};

export type ShiftCandidate = {
  shift: number;
  text: string;
  logScore: number;
};

/**
 * Tries all 26 rotations and keeps the one whose letter pairs are most common
 * in the training text. Scores are compared as log sums; the plain product
 * underflows to 0 on anything longer than a sentence.
 */
export class ShiftDecoder {
  private pairs: ProbabilityModel;

  constructor(trainingText: string, options: ShiftDecoderOptions = {}) {
    const unseen = options.unseenProbability ?? SHIFT_UNSEEN_PROBABILITY;
    this.pairs = new ProbabilityModel(bigrams(canonicalize(trainingText)), unseen);
  }

  score(text: string): number {
    let s = 1;
    for (const pair of bigrams(canonicalize(text))) s *= this.pairs.probability(pair);
    return s;
  }

  logScore(text: string): number {
    let s = 0;
    for (const pair of bigrams(canonicalize(text))) s += Math.log(this.pairs.probability(pair));
    return s;
  }

  rank(ciphertext: string): ShiftCandidate[] {
    return [...allShifts(ciphertext)]
      .map((text, shift) => ({ shift, text, logScore: this.logScore(text) }))
      .sort((a, b) => b.logScore - a.logScore || a.shift - b.shift);
  }

  decode(ciphertext: string): string {
    const [best] = this.rank(ciphertext);
    return best ? best.text : ciphertext;
  }
}

export function decodeShiftCipher(ciphertext: string, trainingText: string): string {
  return new ShiftDecoder(trainingText).decode(ciphertext);
}
