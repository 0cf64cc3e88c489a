import { unigramWordModel } from "../src/ngram";
import { segment } from "../src/segment";
import { words } from "../src/tokenizer";

const text = "it was the best of times it was the worst of times it was the age of wisdom";
const model = unigramWordModel(words(text));
const dense = text.replace(/ /g, "");

const t0 = performance.now();
for (let i = 0; i < 200; i++) segment(dense, model);
const dt = performance.now() - t0;
console.log(`bench_segment ms: ${dt.toFixed(2)}`);
