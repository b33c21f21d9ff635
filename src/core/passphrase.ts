import { pick, type RandomSource } from "./random.js";
import { COMPLEX_SYMBOLS, complexEntropy, passphraseEntropy, rateStrength } from "./strength.js";
import type {
  Capitalization,
  ComplexPasswordRequest,
  ComplexPasswordResult,
  PassphraseRequest,
  PassphraseResult,
  Pool,
  PoolWord,
} from "../types.js";

const DIGITS = "0123456789";

interface Draw {
  word: PoolWord;
  text: string; // pinyin after capitalization
}

/**
 * Compose a passphrase from `request.wordCount` words drawn uniformly, with
 * replacement, from the pool.
 *
 * When `minLength` is set, drawing continues past `wordCount` until the
 * pinyin letters add up to at least `minLength`. Each digit is appended
 * to the end of a randomly chosen word, never placed inside one, so
 * splitting on the separator always yields one token per word.
 */
export function generatePassphrase(
  pool: Pool,
  request: PassphraseRequest,
  random: RandomSource
): PassphraseResult {
  const draws: Draw[] = [];
  let letters = 0;
  while (
    draws.length < request.wordCount ||
    (request.minLength !== undefined && letters < request.minLength)
  ) {
    const draw = drawWord(pool, request.capitalization, random);
    draws.push(draw);
    letters += draw.text.length;
  }

  const suffixes = draws.map(() => "");
  for (let i = 0; i < request.digits; i++) {
    const digit = DIGITS[random.int(DIGITS.length)];
    const position = random.int(draws.length);
    suffixes[position] += digit;
  }

  const tokens = draws.map((d, i) => d.text + suffixes[i]);
  const hint = draws.map((d, i) => hintFor(d) + suffixes[i]).join(request.separator);

  const entropyBits = passphraseEntropy({
    words: draws.length,
    poolSize: pool.length,
    capitalization: request.capitalization,
    digits: request.digits,
  });

  return {
    passphrase: tokens.join(request.separator),
    words: draws.map((d) => d.text),
    hint,
    entropyBits,
    strength: rateStrength(entropyBits),
  };
}

/**
 * Generate a denser password: pinyin words split by random symbols or
 * digits, with two more appended at the end. Words are added until the
 * whole password reaches `minLength`.
 */
export function generateComplexPassword(
  pool: Pool,
  request: ComplexPasswordRequest,
  random: RandomSource
): ComplexPasswordResult {
  const draws: Draw[] = [];
  let letters = 0;
  // n words carry n + 1 symbols
  while (draws.length === 0 || letters + draws.length + 1 < request.minLength) {
    const draw = drawWord(pool, request.capitalization, random);
    draws.push(draw);
    letters += draw.text.length;
  }

  const password: string[] = [];
  const hint: string[] = [];
  draws.forEach((draw, i) => {
    password.push(draw.text);
    hint.push(hintFor(draw));
    if (i < draws.length - 1) {
      const symbol = pickSymbol(random);
      password.push(symbol);
      hint.push(symbol);
    }
  });
  for (let i = 0; i < 2; i++) {
    const symbol = pickSymbol(random);
    password.push(symbol);
    hint.push(symbol);
  }

  const entropyBits = complexEntropy({
    words: draws.length,
    poolSize: pool.length,
    capitalization: request.capitalization,
  });

  return {
    password: password.join(""),
    words: draws.map((d) => d.text),
    hint: hint.join(""),
    entropyBits,
    strength: rateStrength(entropyBits),
  };
}

export function capitalizeFirst(word: string): string {
  return word ? word.charAt(0).toUpperCase() + word.slice(1) : word;
}

function drawWord(pool: Pool, capitalization: Capitalization, random: RandomSource): Draw {
  const word = pick(pool, random);
  let text = word.pinyin;
  if (capitalization === "all" || (capitalization === "random" && random.int(2) === 1)) {
    text = capitalizeFirst(text);
  }
  return { word, text };
}

function pickSymbol(random: RandomSource): string {
  return COMPLEX_SYMBOLS[random.int(COMPLEX_SYMBOLS.length)];
}

/** `你好(nihao)`, or just the pinyin when the entry has no hanzi. */
function hintFor(draw: Draw): string {
  const hanzi = draw.word.hanzi[0];
  return hanzi === undefined ? draw.text : `${hanzi}(${draw.text})`;
}
