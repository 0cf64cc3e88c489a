import { ALPHABET } from "./config";

export type CharTranslator = (ch: string) => string;

export function translate(text: string, fn: CharTranslator): string {
  let out = "";
  for (const ch of text) out += fn(ch);
  return out;
}

export function maketrans(from: string, to: string): CharTranslator {
  const src = [...from];
  const dst = [...to];
  if (src.length !== dst.length) {
    throw new RangeError(`translation tables differ in length: ${src.length} vs ${dst.length}`);
  }
  const table = new Map<string, string>();
  src.forEach((ch, i) => table.set(ch, dst[i]));
  return (ch) => table.get(ch) ?? ch;
}

function assertPermutation(code: string): void {
  const sorted = [...code].sort().join("");
  if (sorted !== ALPHABET) {
    throw new RangeError(`code must be a permutation of "${ALPHABET}", got "${code}"`);
  }
}

/** Substitute letters by position in `code`; case is kept, other characters pass through. */
export function encode(text: string, code: string): string {
  const lower = code.toLowerCase();
  assertPermutation(lower);
  return translate(text, maketrans(ALPHABET + ALPHABET.toUpperCase(), lower + lower.toUpperCase()));
}

export function shiftEncode(text: string, n: number): string {
  if (!Number.isInteger(n)) throw new RangeError(`shift must be an integer, got ${n}`);
  const k = ((n % ALPHABET.length) + ALPHABET.length) % ALPHABET.length;
  return encode(text, ALPHABET.slice(k) + ALPHABET.slice(0, k));
}

export function rot13(text: string): string {
  return shiftEncode(text, 13);
}

export function* allShifts(text: string): Generator<string> {
  for (let i = 0; i < ALPHABET.length; i++) yield shiftEncode(text, i);
}
