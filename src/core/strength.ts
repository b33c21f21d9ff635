import type { Capitalization, StrengthRating } from "../types.js";

/** Characters used between and after words in complex passwords. */
export const COMPLEX_SYMBOLS = "!@#*~0123456789";

export interface PassphraseEntropyInput {
  words: number;
  poolSize: number;
  capitalization: Capitalization;
  digits: number;
}

/**
 * Bits of entropy in a passphrase: one uniform draw from the pool per word,
 * one bit per word for random capitalization, log2(10) per digit. Digit
 * placement is not counted.
 */
export function passphraseEntropy(input: PassphraseEntropyInput): number {
  const perWord = input.poolSize > 1 ? Math.log2(input.poolSize) : 0;
  const caseBits = input.capitalization === "random" ? input.words : 0;
  return input.words * perWord + caseBits + input.digits * Math.log2(10);
}

export interface ComplexEntropyInput {
  words: number;
  poolSize: number;
  capitalization: Capitalization;
}

/**
 * Complex passwords put a symbol between each pair of words and two after
 * the last one, so `words + 1` symbols in total.
 */
export function complexEntropy(input: ComplexEntropyInput): number {
  const perWord = input.poolSize > 1 ? Math.log2(input.poolSize) : 0;
  const caseBits = input.capitalization === "random" ? input.words : 0;
  const symbols = input.words + 1;
  return input.words * perWord + caseBits + symbols * Math.log2(COMPLEX_SYMBOLS.length);
}

export function rateStrength(entropyBits: number): StrengthRating {
  const bits = Math.max(0, entropyBits);
  if (bits < 30) return { score: 0, label: "Very Weak" };
  if (bits < 45) return { score: 1, label: "Weak" };
  if (bits < 60) return { score: 2, label: "Fair" };
  if (bits < 80) return { score: 3, label: "Strong" };
  return { score: 4, label: "Excellent" };
}
