import { loadWordlist, buildPool } from "../core/wordlist.js";
import { generateComplexPassword } from "../core/passphrase.js";
import { parseComplexRequest, resolveCapitalization } from "../core/request.js";
import { secureRandom, type RandomSource } from "../core/random.js";
import { resolveWordlistPath, parseCount, formatStrength, warnIfWeak } from "./util.js";

export interface ComplexCommandOptions {
  minLength?: string;
  capitalize?: boolean;
  randomCase?: boolean;
  syllables?: string;
  count?: string;
  wordlist?: string;
  json?: boolean;
  quiet?: boolean;
}

export function complexCommand(
  options: ComplexCommandOptions,
  random: RandomSource = secureRandom
): void {
  const request = parseComplexRequest({
    minLength: options.minLength,
    capitalization: resolveCapitalization(options),
    syllables: options.syllables,
  });
  const count = parseCount(options.count);

  const wordlist = loadWordlist(resolveWordlistPath(options.wordlist));
  const pool = buildPool(wordlist, request.syllables);

  const results = Array.from({ length: count }, () =>
    generateComplexPassword(pool, request, random)
  );

  if (options.json) {
    console.log(JSON.stringify(count === 1 ? results[0] : results, null, 2));
    return;
  }

  for (const result of results) {
    console.log(result.password);
    if (!options.quiet) {
      console.error(`  Hint:    ${result.hint}`);
      console.error(`  Entropy: ${formatStrength(result.entropyBits, result.strength)}`);
    }
  }

  // Word count varies with the draw, so results can rate differently.
  if (!options.quiet) {
    const weakest = results.reduce((a, b) => (b.entropyBits < a.entropyBits ? b : a));
    const advice = ["a higher --min-length"];
    if (request.capitalization !== "random") advice.push("--random-case");
    warnIfWeak(weakest.entropyBits, weakest.strength, advice);
  }
}
