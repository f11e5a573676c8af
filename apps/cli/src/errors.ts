export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid environment variables:\n${issues.join("\n")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export type AuthFailureReason = "cancelled" | "timed_out" | "failed";

/** Interactive login did not produce a token. */
export class AuthError extends Error {
  readonly reason: AuthFailureReason;

  constructor(reason: AuthFailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuthError";
    this.reason = reason;
  }
}

/**
 * The usage request did not complete with a 2xx status.
 * `status` is 0 when no HTTP response was received at all.
 */
export class FetchError extends Error {
  readonly status: number;
  readonly statusText: string;
  readonly body: string;

  constructor(status: number, statusText: string, body: string, options?: { cause?: unknown }) {
    super(status === 0 ? `request failed: ${statusText}` : `HTTP ${status} ${statusText}`.trimEnd(), options);
    this.name = "FetchError";
    this.status = status;
    this.statusText = statusText;
    this.body = body;
  }
}

const PREVIEW_LENGTH = 200;

/** A 2xx response whose body is not a JSON object. */
export class ParseError extends Error {
  readonly bodyPreview: string;

  constructor(message: string, body: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ParseError";
    this.bodyPreview = body.slice(0, PREVIEW_LENGTH);
  }
}
