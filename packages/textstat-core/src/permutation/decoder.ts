import { translate } from "../cipher";
import type { ScoreFloors } from "../config";
import { bestFirstGraphSearch } from "../search";
import { PermutationSearchProblem, type VariableOrdering } from "./problem";
import { PermutationScorer } from "./scorer";

export type PermutationDecoderOptions = {
  floors?: Partial<ScoreFloors>;
  ordering?: VariableOrdering;
};

export type PermutationDecoding = {
  plaintext: string;
  mapping: Record<string, string>;
  expanded: number;
};

export class PermutationDecoder {
  readonly scorer: PermutationScorer;
  private ordering: VariableOrdering | undefined;

  constructor(trainingText: string, options: PermutationDecoderOptions = {}) {
    this.scorer = new PermutationScorer(trainingText, options.floors);
    this.ordering = options.ordering;
  }

  decode(ciphertext: string): PermutationDecoding {
    const ctx = this.scorer.context(ciphertext);
    const problem = new PermutationSearchProblem(this.scorer, ctx, this.ordering);
    const { node, expanded } = bestFirstGraphSearch(problem, (state) => problem.evaluate(state));
    // Unreachable while the domain fits the alphabet.
    if (!node) throw new Error(`search exhausted after ${expanded} expansions without a full mapping`);
    const full = new Map(node.state.entries());
    full.set(" ", " ");
    return {
      plaintext: translate(ctx.text, (c) => full.get(c) ?? c),
      mapping: node.state.toRecord(),
      expanded
    };
  }
}

export function decodePermutationCipher(ciphertext: string, trainingText: string): string {
  return new PermutationDecoder(trainingText).decode(ciphertext).plaintext;
}
