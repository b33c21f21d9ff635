import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { Capitalization, ComplexPasswordRequest, PassphraseRequest } from "../types.js";

export const DEFAULT_WORD_COUNT = 4;
export const DEFAULT_SEPARATOR = "-";
export const DEFAULT_COMPLEX_MIN_LENGTH = 10;

const wordCount = z.coerce
  .number()
  .int("Word count must be an integer")
  .min(1, "Word count must be at least 1")
  .max(64, "Word count must be at most 64");

const digits = z.coerce
  .number()
  .int("Digit count must be an integer")
  .min(0, "Digit count cannot be negative")
  .max(32, "Digit count must be at most 32");

const minLength = z.coerce
  .number()
  .int("Minimum length must be an integer")
  .min(4, "Minimum length must be at least 4")
  .max(256, "Minimum length must be at most 256");

const syllables = z.coerce
  .number()
  .int("Syllable count must be an integer")
  .min(1, "Syllable count must be at least 1")
  .max(8, "Syllable count must be at most 8");

// Without a separator, adjacent words can run together ambiguously
// ("xi" + "an" vs "xian").
const separator = z
  .string()
  .min(1, "Separator cannot be empty")
  .max(8, "Separator must be at most 8 characters")
  .refine((s) => !/[\p{L}\p{N}]/u.test(s), "Separator cannot contain letters or digits");

const capitalization = z.enum(["none", "all", "random"]);

const PassphraseRequestSchema = z.object({
  wordCount: wordCount.default(DEFAULT_WORD_COUNT),
  separator: separator.default(DEFAULT_SEPARATOR),
  capitalization: capitalization.default("none"),
  digits: digits.default(0),
  minLength: minLength.optional(),
  syllables: syllables.optional(),
});

const ComplexRequestSchema = z.object({
  minLength: minLength.default(DEFAULT_COMPLEX_MIN_LENGTH),
  capitalization: capitalization.default("none"),
  syllables: syllables.optional(),
});

function toConfigError(error: z.ZodError): ConfigError {
  const issue = error.issues[0];
  if (!issue) return new ConfigError("Invalid options");
  const field = issue.path.join(".");
  return new ConfigError(field ? `Invalid ${field}: ${issue.message}` : issue.message);
}

/**
 * Validate raw option values (numbers or numeric strings) into a request.
 * Throws ConfigError on the first invalid field.
 */
export function parsePassphraseRequest(raw: unknown): PassphraseRequest {
  const result = PassphraseRequestSchema.safeParse(raw);
  if (!result.success) throw toConfigError(result.error);
  return result.data;
}

export function parseComplexRequest(raw: unknown): ComplexPasswordRequest {
  const result = ComplexRequestSchema.safeParse(raw);
  if (!result.success) throw toConfigError(result.error);
  return result.data;
}

export function resolveCapitalization(flags: {
  capitalize?: boolean;
  randomCase?: boolean;
}): Capitalization {
  if (flags.capitalize && flags.randomCase) {
    throw new ConfigError("--capitalize and --random-case cannot be combined");
  }
  if (flags.capitalize) return "all";
  if (flags.randomCase) return "random";
  return "none";
}
