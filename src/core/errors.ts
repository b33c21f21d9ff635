/**
 * Base class for failures the CLI reports to the user.
 * `exitCode` is the process exit status for the failure.
 */
export class GeneratorError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

/** Invalid option values or an unsupported combination of flags. */
export class ConfigError extends GeneratorError {
  constructor(message: string) {
    super(message, 2);
  }
}

/** The wordlist is missing, unreadable, empty or malformed. */
export class ResourceError extends GeneratorError {
  constructor(message: string) {
    super(message, 1);
  }
}
