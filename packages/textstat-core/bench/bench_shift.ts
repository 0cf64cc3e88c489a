import { shiftEncode } from "../src/cipher";
import { ShiftDecoder } from "../src/shift";

const corpus = "the quick brown fox jumps over the lazy dog while the cat sleeps in the warm sun";
const d = new ShiftDecoder(corpus);
const cipher = shiftEncode("the lazy cat sleeps while the fox jumps", 11);

const t0 = performance.now();
for (let i = 0; i < 500; i++) d.decode(cipher);
const dt = performance.now() - t0;
console.log(`bench_shift ms: ${dt.toFixed(2)}`);
