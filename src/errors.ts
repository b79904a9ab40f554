/**
 * Error classes shared by the sync pipeline and the CLI.
 */

export class ConfigError extends Error {
  code = "CONFIG_ERROR" as const;
  problems: string[];

  constructor(message: string, problems: string[] = []) {
    super(problems.length > 0 ? `${message}: ${problems.join("; ")}` : message);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

export class StoreError extends Error {
  code = "STORE_ERROR" as const;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreError";
  }
}

/**
 * Get a printable message out of anything thrown.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
