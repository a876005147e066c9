export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * An upstream failure. `errorType` is the heading used in the operator
 * escalation, e.g. "HTTP Error 503" or "Connection Error".
 */
export class ScrapeError extends Error {
  constructor(
    readonly errorType: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ScrapeError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
