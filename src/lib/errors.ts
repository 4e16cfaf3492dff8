/**
 * Raised for environment misconfiguration (bad mapping, separator, thresholds).
 * These abort the run before any recipe is parsed.
 */
export class ConfigError extends Error {
  readonly setting?: string;

  constructor(message: string, setting?: string) {
    super(message);
    this.name = "ConfigError";
    this.setting = setting;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
