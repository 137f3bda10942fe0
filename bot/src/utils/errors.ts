export class WardlineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid or missing runtime configuration; startup cannot continue. */
export class ConfigurationError extends WardlineError {}

/**
 * The infraction store could not be written or read. Pending deletions can no
 * longer be guaranteed once this is raised.
 */
export class PersistenceError extends WardlineError {
  constructor(
    message: string,
    public readonly operation: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** A lexicon source could not be modified. Loading never raises this. */
export class LexiconError extends WardlineError {}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/** A classifier snapshot did not have the expected shape. */
export class ModelFormatError extends WardlineError {}
