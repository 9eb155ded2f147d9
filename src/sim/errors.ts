/** Raised for an invalid DriverConfig before any sampling takes place. */
export class ConfigError extends Error {
  readonly field: string;
  readonly detail: string;

  constructor(field: string, detail: string) {
    super(`${field}: ${detail}`);
    this.name = "ConfigError";
    this.field = field;
    this.detail = detail;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
