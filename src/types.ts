export interface WordEntry {
  hanzi: string | null; // null for bare pinyin lines
  pinyin: string; // tone digits and apostrophes removed
  syllables: number;
}

export interface Wordlist {
  source: string; // file path or label
  entries: readonly WordEntry[];
  fingerprint: string; // sha256 hex of the file text
}

export interface PoolWord {
  pinyin: string;
  hanzi: readonly string[];
}

export type Pool = readonly PoolWord[];

export type Capitalization = "none" | "all" | "random";

export interface PassphraseRequest {
  wordCount: number;
  separator: string;
  capitalization: Capitalization;
  digits: number;
  minLength?: number; // keep drawing past wordCount until this many letters
  syllables?: number;
}

export interface ComplexPasswordRequest {
  minLength: number;
  capitalization: Capitalization;
  syllables?: number;
}

export interface StrengthRating {
  score: 0 | 1 | 2 | 3 | 4;
  label: "Very Weak" | "Weak" | "Fair" | "Strong" | "Excellent";
}

export interface PassphraseResult {
  passphrase: string;
  words: string[];
  hint: string;
  entropyBits: number;
  strength: StrengthRating;
}

export interface ComplexPasswordResult {
  password: string;
  words: string[];
  hint: string;
  entropyBits: number;
  strength: StrengthRating;
}
