/**
 * Contradictory or invalid configuration, rejected before any parsing.
 */
export class ConfigError extends Error {
  constructor(message: string, public readonly statusCode: number = 400) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Missing or unreadable input.
 */
export class InputError extends Error {
  constructor(message: string, public readonly statusCode: number = 404) {
    super(message);
    this.name = 'InputError';
  }
}

/**
 * Status code carried by an error, if any.
 */
export function statusCodeOf(err: unknown): number | undefined {
  if (err instanceof ConfigError || err instanceof InputError) {
    return err.statusCode;
  }
  return undefined;
}
