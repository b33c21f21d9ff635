import { randomInt } from "node:crypto";

export interface RandomSource {
  /** Uniform integer in [0, maxExclusive). */
  int(maxExclusive: number): number;
}

/**
 * CSPRNG-backed source. `randomInt` rejects modulo bias internally.
 */
export const secureRandom: RandomSource = {
  int(maxExclusive: number): number {
    if (!Number.isSafeInteger(maxExclusive) || maxExclusive <= 0) {
      throw new RangeError(`maxExclusive must be a positive integer, got ${maxExclusive}`);
    }
    return randomInt(maxExclusive);
  },
};

export function pick<T>(items: readonly T[], random: RandomSource): T {
  if (items.length === 0) {
    throw new RangeError("Cannot pick from an empty list.");
  }
  const index = random.int(items.length);
  const item = items[index];
  if (item === undefined) {
    throw new RangeError(`Random source returned out-of-range index ${index}`);
  }
  return item;
}
