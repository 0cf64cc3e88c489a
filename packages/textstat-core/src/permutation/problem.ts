import { ALPHABET } from "../config";
import { UnsupportedDomainError } from "../errors";
import { CharMapping } from "../mapping";
import type { UnigramModel } from "../ngram";
import type { SearchProblem } from "../search";
import type { CipherContext, PermutationScorer } from "./scorer";

export type Assignment = {
  cipher: string;
  plain: string;
};

/** Picks which unmapped cipher letter the next search level assigns. */
export type VariableOrdering = (unmapped: readonly string[], letters: UnigramModel) => string;

/**
 * Default ordering: the unmapped cipher letter that is most frequent as a
 * *plain* letter in the training text, first appearance winning ties. It uses
 * global letter frequency only and ignores what has been decoded so far.
 */
export const mostFrequentLetter: VariableOrdering = (unmapped, letters) => {
  let best = unmapped[0];
  let bestP = -Infinity;
  for (const c of unmapped) {
    const p = letters.probability(c);
    if (p > bestP) {
      best = c;
      bestP = p;
    }
  }
  return best;
};

export class PermutationSearchProblem implements SearchProblem<CharMapping, Assignment> {
  readonly initialState = CharMapping.empty;
  readonly ctx: CipherContext;
  private scorer: PermutationScorer;
  private ordering: VariableOrdering;

  constructor(scorer: PermutationScorer, ctx: CipherContext, ordering: VariableOrdering = mostFrequentLetter) {
    if (ctx.domain.length > ALPHABET.length) {
      throw new UnsupportedDomainError(ctx.domain.length, ALPHABET.length);
    }
    this.scorer = scorer;
    this.ctx = ctx;
    this.ordering = ordering;
  }

  *actions(state: CharMapping): Generator<Assignment> {
    const unmapped = this.ctx.domain.filter((c) => !state.has(c));
    if (unmapped.length === 0) return;
    const cipher = this.ordering(unmapped, this.scorer.letters);
    for (const plain of ALPHABET) {
      if (!state.isTarget(plain)) yield { cipher, plain };
    }
  }

  result(state: CharMapping, action: Assignment): CharMapping {
    return state.with(action.cipher, action.plain);
  }

  goalTest(state: CharMapping): boolean {
    return state.size >= this.ctx.domain.length;
  }

  stateKey(state: CharMapping): string {
    return state.key();
  }

  /** Search ordering: the scorer's cost taken in the log domain. */
  evaluate(state: CharMapping): number {
    return -this.scorer.logProbability(state, this.ctx);
  }
}
