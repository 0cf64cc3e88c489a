import { WORD_PATTERN } from "./config";

export function words(text: string): string[] {
  return text.toLowerCase().match(WORD_PATTERN) ?? [];
}

/** Lowercase letters separated by single spaces. */
export function canonicalize(text: string): string {
  return words(text).join(" ");
}

export function bigrams(text: string): string[];
export function bigrams<T>(tokens: readonly T[]): T[][];
export function bigrams<T>(seq: string | readonly T[]): Array<string | T[]> {
  const out: Array<string | T[]> = [];
  for (let i = 0; i < seq.length - 1; i++) {
    out.push(typeof seq === "string" ? seq.slice(i, i + 2) : seq.slice(i, i + 2));
  }
  return out;
}
