import { loadWordlist, buildPool } from "../core/wordlist.js";
import { generatePassphrase } from "../core/passphrase.js";
import { parsePassphraseRequest, resolveCapitalization } from "../core/request.js";
import { secureRandom, type RandomSource } from "../core/random.js";
import { resolveWordlistPath, parseCount, formatStrength, warnIfWeak } from "./util.js";

export interface GenerateCommandOptions {
  words?: string;
  separator?: string;
  capitalize?: boolean;
  randomCase?: boolean;
  digits?: string;
  minLength?: string;
  syllables?: string;
  count?: string;
  wordlist?: string;
  json?: boolean;
  quiet?: boolean;
}

/**
 * Generate one or more passphrases. Passphrases go to stdout; the memory
 * hint and entropy summary go to stderr.
 */
export function generateCommand(
  options: GenerateCommandOptions,
  random: RandomSource = secureRandom
): void {
  // Validate everything before touching the wordlist or writing output.
  const request = parsePassphraseRequest({
    wordCount: options.words,
    separator: options.separator,
    capitalization: resolveCapitalization(options),
    digits: options.digits,
    minLength: options.minLength,
    syllables: options.syllables,
  });
  const count = parseCount(options.count);

  const wordlist = loadWordlist(resolveWordlistPath(options.wordlist));
  const pool = buildPool(wordlist, request.syllables);

  const results = Array.from({ length: count }, () => generatePassphrase(pool, request, random));

  if (options.json) {
    console.log(JSON.stringify(count === 1 ? results[0] : results, null, 2));
    return;
  }

  for (const result of results) {
    console.log(result.passphrase);
    if (!options.quiet) {
      console.error(`  Hint:    ${result.hint}`);
      console.error(`  Entropy: ${formatStrength(result.entropyBits, result.strength)}`);
    }
  }

  if (!options.quiet) {
    const weakest = results.reduce((a, b) => (b.entropyBits < a.entropyBits ? b : a));
    const advice = ["more --words"];
    if (request.digits === 0) advice.push("--digits");
    if (request.capitalization !== "random") advice.push("--random-case");
    warnIfWeak(weakest.entropyBits, weakest.strength, advice);
  }
}
