/**
 * Raised for startup problems the caller has to fix: a corrupt mapping store,
 * an invalid extraction schema, or bad environment values.
 */
export class ConfigurationError extends Error {
  readonly source: string;

  constructor(message: string, source: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.source = source;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
