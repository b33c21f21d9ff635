import { loadWordlist, buildPool } from "../core/wordlist.js";
import { parsePassphraseRequest } from "../core/request.js";
import { resolveWordlistPath, formatBits } from "./util.js";

export interface WordlistCommandOptions {
  syllables?: string;
  wordlist?: string;
  json?: boolean;
}

/**
 * Describe the wordlist in use: where it came from, how many words it
 * offers, and what each drawn word is worth in bits.
 */
export function wordlistCommand(options: WordlistCommandOptions): void {
  const { syllables } = parsePassphraseRequest({ syllables: options.syllables });

  const wordlist = loadWordlist(resolveWordlistPath(options.wordlist));
  const pool = buildPool(wordlist, syllables);
  const bitsPerWord = pool.length > 1 ? Math.log2(pool.length) : 0;

  if (options.json) {
    console.log(
      JSON.stringify(
        {
          source: wordlist.source,
          entries: wordlist.entries.length,
          spellings: pool.length,
          syllables: syllables ?? null,
          bitsPerWord,
          sha256: wordlist.fingerprint,
        },
        null,
        2
      )
    );
    return;
  }

  console.log(`Source:    ${wordlist.source}`);
  console.log(`Entries:   ${wordlist.entries.length}`);
  console.log(
    `Spellings: ${pool.length}${syllables === undefined ? "" : ` (${syllables} syllable(s))`}`
  );
  console.log(`Per word:  ${formatBits(bitsPerWord)} bits`);
  console.log(`SHA-256:   ${wordlist.fingerprint}`);
}
