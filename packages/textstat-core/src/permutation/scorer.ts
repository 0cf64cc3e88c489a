import { translate } from "../cipher";
import { DEFAULT_FLOORS, type ScoreFloors } from "../config";
import type { CharMapping } from "../mapping";
import { ngramCharModel, unigramCharModel, unigramWordModel, type NgramModel, type UnigramModel } from "../ngram";
import { bigrams, canonicalize, words } from "../tokenizer";

export type CipherContext = {
  text: string;
  /** Distinct non-space characters, in order of first appearance. */
  domain: string[];
};

export function cipherContext(ciphertext: string): CipherContext {
  const text = canonicalize(ciphertext);
  const domain = [...new Set(text.replace(/ /g, ""))];
  return { text, domain };
}

/**
 * Scores a partial mapping by decoding the ciphertext with it and asking three
 * models (words, letters, letter pairs) how likely the result is. Letters the
 * mapping has not decided yet decode to themselves, so a partial state is
 * scored as if those letters were already plaintext.
 */
export class PermutationScorer {
  readonly words: UnigramModel;
  readonly letters: UnigramModel;
  readonly pairs: NgramModel;
  readonly floors: Readonly<ScoreFloors>;

  constructor(trainingText: string, floors: Partial<ScoreFloors> = {}) {
    const corpus = words(trainingText);
    this.words = unigramWordModel(corpus);
    this.letters = unigramCharModel(corpus);
    this.pairs = ngramCharModel(2, corpus);
    this.floors = { ...DEFAULT_FLOORS, ...floors };
  }

  context(ciphertext: string): CipherContext {
    return cipherContext(ciphertext);
  }

  complete(mapping: CharMapping, ctx: CipherContext): Map<string, string> {
    const full = new Map<string, string>(mapping.entries());
    for (const c of ctx.domain) {
      if (!full.has(c)) full.set(c, c);
    }
    full.set(" ", " ");
    return full;
  }

  trial(mapping: CharMapping, ctx: CipherContext): string {
    const full = this.complete(mapping, ctx);
    return translate(ctx.text, (c) => full.get(c) ?? c);
  }

  logProbability(mapping: CharMapping, ctx: CipherContext): number {
    const text = this.trial(mapping, ctx);
    const { word, letter, bigram } = this.floors;
    let logP = 0;
    for (const w of text.split(" ")) {
      if (w) logP += Math.log(this.words.probability(w) + word);
    }
    for (const c of text) logP += Math.log(this.letters.probability(c) + letter);
    for (const pair of bigrams(text)) logP += Math.log(this.pairs.probability(pair) + bigram);
    return logP;
  }

  /** Cost of a mapping: -P(trial text). Lower is better. */
  score(mapping: CharMapping, ctx: CipherContext): number {
    return -Math.exp(this.logProbability(mapping, ctx));
  }
}
