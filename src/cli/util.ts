import { defaultWordlistPath } from "../core/wordlist.js";
import { GeneratorError, ConfigError } from "../core/errors.js";
import type { StrengthRating } from "../types.js";

export const MAX_COUNT = 50;

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Wordlist location: --wordlist, then $PPGEN_WORDLIST, then the bundled file.
 */
export function resolveWordlistPath(
  override?: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  return override || env.PPGEN_WORDLIST || defaultWordlistPath();
}

export function parseCount(value: string | undefined): number {
  if (value === undefined) return 1;
  const count = Number(value);
  if (!Number.isInteger(count) || count < 1 || count > MAX_COUNT) {
    throw new ConfigError(`Count must be an integer between 1 and ${MAX_COUNT}, got "${value}"`);
  }
  return count;
}

export function formatBits(bits: number): string {
  return bits.toFixed(1);
}

export function formatStrength(bits: number, strength: StrengthRating): string {
  return `${formatBits(bits)} bits (${strength.label})`;
}

/**
 * Warn on stderr when a secret rates below "Fair". `advice` names the
 * options that would raise the entropy.
 */
export function warnIfWeak(bits: number, strength: StrengthRating, advice: string[]): void {
  if (strength.score >= 2) return;
  const tip = advice.length > 0 ? ` Try ${joinOr(advice)}.` : "";
  console.warn(`Warning: only ~${formatBits(bits)} bits of entropy.${tip}`);
}

function joinOr(items: string[]): string {
  if (items.length <= 1) return items.join("");
  return `${items.slice(0, -1).join(", ")} or ${items[items.length - 1]}`;
}

/**
 * Wrap a command action: report failures on stderr and exit with the
 * error's exit code.
 */
export function runAction<A extends unknown[]>(
  action: (...args: A) => void
): (...args: A) => void {
  return (...args: A) => {
    try {
      action(...args);
    } catch (err) {
      console.error(`Error: ${toErrorMessage(err)}`);
      process.exit(err instanceof GeneratorError ? err.exitCode : 1);
    }
  };
}
