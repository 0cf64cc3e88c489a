export const ALPHABET = "abcdefghijklmnopqrstuvwxyz";

// Applied after lowercasing; digits and punctuation are dropped.
export const WORD_PATTERN = /\p{L}+/gu;

// Marks the start of a word in character n-gram models.
export const BOUNDARY = " ";

export type ScoreFloors = {
  word: number;
  letter: number;
  bigram: number;
};

export const DEFAULT_FLOORS: Readonly<ScoreFloors> = Object.freeze({
  word: 1e-20,
  letter: 1e-5,
  bigram: 1e-10
});

export const SHIFT_UNSEEN_PROBABILITY = 1e-6;
