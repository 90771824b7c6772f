export class InvalidConfigurationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = "InvalidConfigurationError";
    this.field = field;
  }
}

export function getErrorMessage(error: unknown, fallback: string): string {
  if (error instanceof Error) return error.message;
  return fallback;
}

export function requireInteger(field: string, value: number, min: number): number {
  if (!Number.isInteger(value) || value < min) {
    throw new InvalidConfigurationError(field, `${field} must be an integer >= ${min} (got ${value})`);
  }
  return value;
}
