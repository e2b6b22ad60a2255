/** Missing or invalid input that makes one step (or the whole command) impossible. */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly field?: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** Raised by an adapter when a file cannot be scanned. The extractor skips that file. */
export class SourceParseError extends Error {
  constructor(
    message: string,
    readonly file: string,
    readonly line?: number,
  ) {
    super(line !== undefined ? `${file}:${line}: ${message}` : `${file}: ${message}`);
    this.name = 'SourceParseError';
  }
}

/** The generative backend gave no usable answer and the rule fallback is disabled. */
export class SuggestionUnavailableError extends Error {
  constructor(
    message: string,
    readonly fingerprint: string,
  ) {
    super(message);
    this.name = 'SuggestionUnavailableError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
