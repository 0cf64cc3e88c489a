import { describe, it, expect } from "vitest";
import { encode } from "../src/cipher";
import { ALPHABET } from "../src/config";
import { UnsupportedDomainError } from "../src/errors";
import { CharMapping } from "../src/mapping";
import { PermutationDecoder, decodePermutationCipher } from "../src/permutation/decoder";
import { PermutationSearchProblem } from "../src/permutation/problem";
import { PermutationScorer, cipherContext } from "../src/permutation/scorer";
import { TRAINING_TEXT } from "./helpers/corpus";

describe("char mapping", () => {
  it("derives new values without touching the parent", () => {
    const a = CharMapping.empty.with("x", "e");
    const b = a.with("y", "t");
    expect(a.size).toBe(1);
    expect(b.size).toBe(2);
    expect(a.has("y")).toBe(false);
    expect(b.isTarget("t")).toBe(true);
    expect(b.key()).toBe(CharMapping.from([["y", "t"], ["x", "e"]]).key());
  });

  it("refuses to overwrite a key or reuse a target", () => {
    const m = CharMapping.empty.with("x", "e");
    expect(() => m.with("x", "a")).toThrow(RangeError);
    expect(() => m.with("y", "e")).toThrow(RangeError);
  });
});

describe("permutation scorer", () => {
  it("builds the cipher domain from canonical text", () => {
    expect(cipherContext("Ab, ba!")).toEqual({ text: "ab ba", domain: ["a", "b"] });
  });

  it("scores undecided letters as themselves", () => {
    const scorer = new PermutationScorer(TRAINING_TEXT);
    const ctx = scorer.context("gsv wlt");
    const identity = CharMapping.from(ctx.domain.map((c): [string, string] => [c, c]));
    expect(scorer.trial(CharMapping.empty, ctx)).toBe("gsv wlt");
    expect(scorer.logProbability(CharMapping.empty, ctx)).toBe(scorer.logProbability(identity, ctx));
  });

  it("turns the log probability into a negative cost", () => {
    const scorer = new PermutationScorer("no no no on");
    const ctx = scorer.context("ab ab ab ba");
    const good = CharMapping.from([["a", "n"], ["b", "o"]]);
    expect(scorer.trial(good, ctx)).toBe("no no no on");
    expect(scorer.score(good, ctx)).toBe(-Math.exp(scorer.logProbability(good, ctx)));
    expect(scorer.score(good, ctx)).toBeLessThan(scorer.score(CharMapping.empty, ctx));
  });
});

describe("permutation search problem", () => {
  const scorer = new PermutationScorer("eee t");

  it("assigns the most frequent letter first", () => {
    const problem = new PermutationSearchProblem(scorer, cipherContext("te"));
    const first = [...problem.actions(problem.initialState)];
    expect(first).toHaveLength(26);
    expect(first.every((a) => a.cipher === "e")).toBe(true);

    const next = problem.result(problem.initialState, { cipher: "e", plain: "a" });
    expect(problem.initialState.size).toBe(0);
    const second = [...problem.actions(next)];
    expect(second).toHaveLength(25);
    expect(second.every((a) => a.cipher === "t" && a.plain !== "a")).toBe(true);
    expect(problem.goalTest(next)).toBe(false);
    expect(problem.goalTest(next.with("t", "b"))).toBe(true);
  });

  it("accepts a custom ordering", () => {
    const problem = new PermutationSearchProblem(scorer, cipherContext("te"), (unmapped) => unmapped[0]);
    expect([...problem.actions(problem.initialState)][0].cipher).toBe("t");
  });

  it("rejects a domain larger than the alphabet", () => {
    const ctx = cipherContext(ALPHABET + " é");
    expect(ctx.domain).toHaveLength(27);
    expect(() => new PermutationSearchProblem(scorer, ctx)).toThrow(UnsupportedDomainError);
  });
});

describe("permutation decoder", () => {
  it("decodes a small substitution", () => {
    const out = new PermutationDecoder("no no no on").decode("AB ab, ab ba!");
    expect(out.plaintext).toBe("no no no on");
    expect(out.mapping).toEqual({ a: "n", b: "o" });
    expect(decodePermutationCipher("q", "a a a b")).toBe("a");
  });

  it("returns a bijection over the domain that beats the identity", () => {
    const decoder = new PermutationDecoder(TRAINING_TEXT);
    const ciphertext = encode("the", "zyxwvutsrqponmlkjihgfedcba");
    const ctx = decoder.scorer.context(ciphertext);
    const out = decoder.decode(ciphertext);

    expect(Object.keys(out.mapping).sort()).toEqual([...ctx.domain].sort());
    const targets = Object.values(out.mapping);
    expect(new Set(targets).size).toBe(targets.length);
    expect(targets.every((t) => ALPHABET.includes(t))).toBe(true);

    const decoded = CharMapping.from(Object.entries(out.mapping));
    expect(decoder.scorer.logProbability(decoded, ctx)).toBeGreaterThanOrEqual(
      decoder.scorer.logProbability(CharMapping.empty, ctx)
    );
    expect(decoder.scorer.score(decoded, ctx)).toBeLessThanOrEqual(decoder.scorer.score(CharMapping.empty, ctx));
  });

  it("maps every letter of a longer ciphertext exactly once", () => {
    const decoder = new PermutationDecoder(TRAINING_TEXT);
    const ciphertext = encode("the dog sleeps in the sun", "qwertyuiopasdfghjklzxcvbnm");
    const ctx = decoder.scorer.context(ciphertext);
    expect(ctx.domain.length).toBeGreaterThanOrEqual(10);
    const out = decoder.decode(ciphertext);

    expect(Object.keys(out.mapping).sort()).toEqual([...ctx.domain].sort());
    const targets = Object.values(out.mapping);
    expect(new Set(targets).size).toBe(ctx.domain.length);
    expect(targets.every((t) => ALPHABET.includes(t))).toBe(true);
    expect(out.plaintext).toHaveLength(ctx.text.length);

    const decoded = CharMapping.from(Object.entries(out.mapping));
    expect(decoder.scorer.logProbability(decoded, ctx)).toBeGreaterThanOrEqual(
      decoder.scorer.logProbability(CharMapping.empty, ctx)
    );
  });

  it("signals an unsupported domain", () => {
    expect(() => decodePermutationCipher(ALPHABET + " é", TRAINING_TEXT)).toThrow(UnsupportedDomainError);
  });

  it("handles text without letters", () => {
    expect(new PermutationDecoder(TRAINING_TEXT).decode("123 !")).toEqual({ plaintext: "", mapping: {}, expanded: 0 });
  });
});
