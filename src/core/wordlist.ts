import { readFileSync } from "fs";
import { fileURLToPath } from "url";
import { sha256 } from "@noble/hashes/sha2.js";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils.js";
import { ResourceError } from "./errors.js";
import type { Pool, PoolWord, WordEntry, Wordlist } from "../types.js";

const PINYIN_LETTERS = /^[a-zü]+$/;
const UTF8 = new TextDecoder("utf-8", { fatal: true });

/**
 * Path of the wordlist shipped with the package (data/chinese_words.txt).
 * Resolves the same from src/core and dist/core.
 */
export function defaultWordlistPath(): string {
  return fileURLToPath(new URL("../../data/chinese_words.txt", import.meta.url));
}

/**
 * Read and parse a wordlist file. Throws ResourceError when the file is
 * missing, unreadable, not valid UTF-8, or fails to parse.
 */
export function loadWordlist(path: string): Wordlist {
  let bytes: Uint8Array;
  try {
    bytes = readFileSync(path);
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code === "ENOENT") {
      throw new ResourceError(`Wordlist not found: ${path}`);
    }
    throw new ResourceError(
      `Could not read wordlist ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  let text: string;
  try {
    text = UTF8.decode(bytes);
  } catch {
    throw new ResourceError(`Wordlist ${path} is not valid UTF-8`);
  }
  return parseWordlist(text, path);
}

/**
 * Parse wordlist text.
 *
 * Each non-blank line is either `hanzi<TAB>pinyin` or a bare pinyin token.
 * Pinyin may carry tone digits (`ni3hao3`) and apostrophe syllable breaks
 * (`xi1'an1`); both are stripped. Lines starting with `#` are comments.
 */
export function parseWordlist(text: string, source: string): Wordlist {
  const entries: WordEntry[] = [];
  const lines = text.replace(/^\uFEFF/, "").split(/\r?\n/);

  lines.forEach((raw, i) => {
    const line = raw.trim();
    if (line === "" || line.startsWith("#")) return;
    entries.push(parseLine(line, source, i + 1));
  });

  if (entries.length === 0) {
    throw new ResourceError(`Wordlist ${source} contains no words.`);
  }

  return Object.freeze({
    source,
    entries: Object.freeze(entries),
    fingerprint: bytesToHex(sha256(utf8ToBytes(text))),
  });
}

function parseLine(line: string, source: string, lineNumber: number): WordEntry {
  const fields = line.split("\t").map((f) => f.trim());
  let hanzi: string | null = null;
  let rawPinyin: string;

  if (fields.length === 1) {
    rawPinyin = fields[0];
  } else {
    hanzi = fields[0];
    rawPinyin = fields[1];
    if (!hanzi) {
      throw new ResourceError(`${source}:${lineNumber}: missing word before tab`);
    }
  }

  const toneCount = (rawPinyin.match(/\d/g) ?? []).length;
  const pinyin = rawPinyin.replace(/[\d']/g, "").toLowerCase();
  if (!PINYIN_LETTERS.test(pinyin)) {
    throw new ResourceError(`${source}:${lineNumber}: invalid pinyin "${rawPinyin}"`);
  }

  const syllables =
    toneCount > 0 ? toneCount : rawPinyin.split("'").filter((s) => s.length > 0).length;

  return Object.freeze({ hanzi, pinyin, syllables });
}

/**
 * Collapse a wordlist into its distinct pinyin spellings. Homophones such
 * as 眼睛/眼镜 (both "yanjing") become one pool word, so a uniform draw over
 * the pool is uniform over the strings that can appear in a passphrase.
 *
 * `syllables` keeps only entries with that many syllables.
 */
export function buildPool(wordlist: Wordlist, syllables?: number): Pool {
  const bySpelling = new Map<string, string[]>();

  for (const entry of wordlist.entries) {
    if (syllables !== undefined && entry.syllables !== syllables) continue;
    let hanzi = bySpelling.get(entry.pinyin);
    if (!hanzi) {
      hanzi = [];
      bySpelling.set(entry.pinyin, hanzi);
    }
    if (entry.hanzi !== null && !hanzi.includes(entry.hanzi)) {
      hanzi.push(entry.hanzi);
    }
  }

  if (bySpelling.size === 0) {
    throw new ResourceError(
      `No words with ${syllables} syllable(s) in wordlist ${wordlist.source}.`
    );
  }

  const pool: PoolWord[] = [];
  for (const [pinyin, hanzi] of bySpelling) {
    pool.push(Object.freeze({ pinyin, hanzi: Object.freeze(hanzi) }));
  }
  return Object.freeze(pool);
}
