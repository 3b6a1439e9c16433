/** Exit code for configuration problems (missing token) */
export const EXIT_CONFIG = 1;

/** Exit code for malformed user input (repo paths, boolean flags, patterns) */
export const EXIT_INPUT = 2;

/** Exit code for GitHub API and transport failures */
export const EXIT_API_ERROR = 3;

/**
 * Base class for every error gh-graft raises on purpose.
 */
export class GraftError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

export class ConfigError extends GraftError {
  constructor(message: string) {
    super(message, EXIT_CONFIG);
  }
}

export class InputError extends GraftError {
  constructor(message: string) {
    super(message, EXIT_INPUT);
  }
}

/**
 * GraphQL response carried an `errors` list where partial data is not usable.
 */
export class ApiError extends GraftError {
  readonly messages: string[];

  constructor(summary: string, messages: string[]) {
    super(messages.length > 0 ? `${summary}: ${messages.join('; ')}` : summary, EXIT_API_ERROR);
    this.messages = messages;
  }
}

/**
 * A path that must exist in an API response was absent or null.
 */
export class MissingPathError extends GraftError {
  readonly path: string;

  constructor(path: string, at: string) {
    super(`Expected path '${path}' is missing (stopped at '${at}')`, EXIT_API_ERROR);
    this.path = path;
  }
}

/**
 * Scrub secrets and credentials from a string.
 * Replaces known token patterns with [REDACTED].
 */
export function scrubSecrets(text: string): string {
  return text
    // GitHub classic tokens (ghp_, gho_, ghs_, ghr_, ghu_)
    .replace(/\b(ghp_|gho_|ghs_|ghr_|ghu_)[a-zA-Z0-9_]+/g, '[REDACTED]')
    // GitHub fine-grained PATs
    .replace(/\bgithub_pat_[a-zA-Z0-9_]+/g, '[REDACTED]')
    // Authorization header values
    .replace(/(authorization:\s*(?:token|bearer))\s+[a-zA-Z0-9._-]+/gi, '$1 [REDACTED]')
    .replace(/\bBearer\s+[a-zA-Z0-9._-]+/g, 'Bearer [REDACTED]')
    // Long opaque values after the word "token"; plain prose is left alone
    .replace(/\b(token)\s+(?=[a-zA-Z0-9._-]{20,})[a-zA-Z0-9._-]+/gi, '$1 [REDACTED]');
}

/**
 * Extract a safe error message from an unknown error value.
 */
export function sanitizeError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return scrubSecrets(message);
}

/**
 * Exit code for an error that reached the CLI entry point.
 * Transport failures (octokit RequestError, fetch TypeError) count as API errors.
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof GraftError) return error.exitCode;
  if (error instanceof Error && (error.name === 'HttpError' || error.name === 'RequestError')) {
    return EXIT_API_ERROR;
  }
  if (error instanceof TypeError && error.message === 'fetch failed') {
    return EXIT_API_ERROR;
  }
  return 1;
}
