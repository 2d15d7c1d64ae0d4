/**
 * Base class for failures that end a digest run.
 */
export class DigestError extends Error {
  public readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
  }
}

export class ConfigError extends DigestError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(
      issues.length > 0 ? `${message}: ${issues.join("; ")}` : message,
      "CONFIG_INVALID"
    );
    this.issues = issues;
  }
}

/**
 * Raised when the search API refuses a request because the quota is spent.
 * Never retried inside the run.
 */
export class RateLimitError extends DigestError {
  public readonly resetAt?: Date;

  constructor(resetAt?: Date) {
    super(
      resetAt
        ? `GitHub API rate limit exceeded; resets at ${formatResetTime(resetAt)}`
        : "GitHub API rate limit exceeded",
      "RATE_LIMITED"
    );
    this.resetAt = resetAt;
  }
}

function formatResetTime(date: Date): string {
  return date.toISOString().replace("T", " ").replace(/\.\d{3}Z$/, " UTC");
}
