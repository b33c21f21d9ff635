#!/usr/bin/env node

import { Command } from "commander";
import { generateCommand, type GenerateCommandOptions } from "./cli/generate.js";
import { complexCommand, type ComplexCommandOptions } from "./cli/complex.js";
import { wordlistCommand, type WordlistCommandOptions } from "./cli/wordlist.js";
import { runAction } from "./cli/util.js";
import { VERSION } from "./version.js";

const program = new Command();

program
  .name("ppgen")
  .description("Memorable passphrases from Chinese pinyin")
  .version(VERSION);

program
  .command("generate", { isDefault: true })
  .description("Generate a passphrase of pinyin words")
  .option("-w, --words <n>", "Number of words", "4")
  .option("-s, --separator <sep>", "Separator between words", "-")
  .option("-c, --capitalize", "Capitalize the first letter of every word")
  .option("-r, --random-case", "Randomly capitalize the first letter of each word")
  .option("-d, --digits <n>", "Random digits to append to random words", "0")
  .option("-l, --min-length <n>", "Keep adding words until the pinyin reaches this many letters")
  .option("--syllables <n>", "Only use words with this many syllables")
  .option("-n, --count <n>", "How many passphrases to generate", "1")
  .option("--wordlist <path>", "Wordlist file (defaults to $PPGEN_WORDLIST or the bundled list)")
  .option("--json", "Output JSON instead of plain text")
  .option("-q, --quiet", "Print only the passphrase")
  .action(
    runAction((options: GenerateCommandOptions) => {
      generateCommand(options);
    })
  );

program
  .command("complex")
  .description("Generate a dense password of pinyin split by symbols and digits")
  .option("-l, --min-length <n>", "Minimum password length", "10")
  .option("-c, --capitalize", "Capitalize the first letter of every word")
  .option("-r, --random-case", "Randomly capitalize the first letter of each word")
  .option("--syllables <n>", "Only use words with this many syllables")
  .option("-n, --count <n>", "How many passwords to generate", "1")
  .option("--wordlist <path>", "Wordlist file (defaults to $PPGEN_WORDLIST or the bundled list)")
  .option("--json", "Output JSON instead of plain text")
  .option("-q, --quiet", "Print only the password")
  .action(
    runAction((options: ComplexCommandOptions) => {
      complexCommand(options);
    })
  );

program
  .command("wordlist")
  .description("Show wordlist size, bits per word and fingerprint")
  .option("--syllables <n>", "Only count words with this many syllables")
  .option("--wordlist <path>", "Wordlist file (defaults to $PPGEN_WORDLIST or the bundled list)")
  .option("--json", "Output JSON instead of plain text")
  .action(
    runAction((options: WordlistCommandOptions) => {
      wordlistCommand(options);
    })
  );

program.parse();
