/**
 * Error types raised by the SharePoint client
 *
 * Read and create operations catch these and report "nothing found";
 * they only surface from BaseClient, the factory and config loading.
 */

export class SharePointError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends SharePointError {
  constructor(readonly missingFields: string[]) {
    super(
      `Configuration validation failed. Missing fields: ${missingFields.join(", ")}`
    );
  }
}

export class AuthenticationError extends SharePointError {}

export class MissingTokenError extends SharePointError {
  constructor() {
    super("Access token is missing or invalid");
  }
}

export class MalformedResponseError extends SharePointError {
  constructor(
    readonly url: string,
    readonly issues: string[]
  ) {
    super(`Malformed response from ${url}: ${issues.join("; ")}`);
  }
}

/**
 * Render any thrown value as a single log-friendly line.
 * Graph SDK errors carry a statusCode and code next to the message.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const status = readStatusCode(error);
    return status === undefined
      ? error.message
      : `${status} ${error.message}`.trim();
  }
  return String(error);
}

function readStatusCode(error: Error): number | undefined {
  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  return undefined;
}
