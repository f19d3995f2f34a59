/**
 * Base class for the fatal conditions this package reports. Everything else (absent fields,
 * patterns that do not match, malformed destinations) is handled by skipping a write.
 */
export class MapperError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The operation list could not be loaded; the mapper must not start. */
export class ConfigurationError extends MapperError {}

/** A single record could not be decoded; only that record is aborted. */
export class RecordError extends MapperError {}

export const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));
