/**
 * Raised for setup problems that must stop a run before any page is fetched:
 * missing input file, missing URL column, malformed CLI arguments.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
