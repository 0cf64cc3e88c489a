import { describe, it, expect } from "vitest";
import { shiftEncode } from "../src/cipher";
import { ShiftDecoder, decodeShiftCipher } from "../src/shift";
import { TRAINING_TEXT } from "./helpers/corpus";

describe("shift decoder", () => {
  it("recovers lowercase text", () => {
    const plain = "the fox runs into the forest";
    expect(decodeShiftCipher(shiftEncode(plain, 7), TRAINING_TEXT)).toBe(plain);
  });

  it("keeps the case of the ciphertext", () => {
    const plain = "The Dog Sleeps";
    expect(decodeShiftCipher(shiftEncode(plain, 3), TRAINING_TEXT)).toBe(plain);
  });

  it("multiplies pair probabilities with a floor for unseen pairs", () => {
    const d = new ShiftDecoder("ab ab");
    expect(d.score("ab")).toBe(0.5);
    expect(d.score("zz")).toBe(1e-6);
    expect(d.logScore("ab")).toBe(Math.log(0.5));
  });

  it("falls back to the smallest shift on a tie", () => {
    const d = new ShiftDecoder(TRAINING_TEXT);
    expect(d.decode("!!")).toBe("!!");
    const ranked = d.rank("!!");
    expect(ranked).toHaveLength(26);
    expect(ranked[0].shift).toBe(0);
  });

  it("ranks the true shift first", () => {
    const d = new ShiftDecoder(TRAINING_TEXT);
    const ranked = d.rank(shiftEncode("they walk along the river", 20));
    expect(ranked[0].shift).toBe(6);
    expect(ranked[0].text).toBe("they walk along the river");
  });
});
