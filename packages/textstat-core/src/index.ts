export * from "./config";
export * from "./errors";
export * from "./random";
export * from "./tokenizer";
export * from "./distribution";
export * from "./ngram";
export * from "./segment";
export * from "./cipher";
export * from "./shift";
export * from "./mapping";
export * from "./search";
export * from "./permutation/scorer";
export * from "./permutation/problem";
export * from "./permutation/decoder";
