export class ScraperError extends Error {
  constructor(message: string, public readonly retryable: boolean, public readonly underlying?: unknown) {
    super(message);
    this.name = 'ScraperError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ConfigError extends ScraperError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, false);
    this.name = 'ConfigError';
  }
}

export class NavigationError extends ScraperError {
  constructor(public readonly url: string, message: string, cause?: unknown) {
    super(`${message} (${url})`, true, cause);
    this.name = 'NavigationError';
  }
}

export class ExtractionError extends ScraperError {
  constructor(message: string, cause?: unknown) {
    super(message, true, cause);
    this.name = 'ExtractionError';
  }
}

export class AuthenticationError extends ScraperError {
  constructor(message: string, cause?: unknown) {
    super(message, false, cause);
    this.name = 'AuthenticationError';
  }
}

export class NotLoggedInError extends ScraperError {
  constructor() {
    super('Not logged in. Please authenticate first.', false);
    this.name = 'NotLoggedInError';
  }
}

export class ProxyError extends ScraperError {
  constructor(message: string) {
    super(message, false);
    this.name = 'ProxyError';
  }
}

export class RetryExhaustedError extends ScraperError {
  constructor(public readonly label: string, public readonly attempts: number, cause: unknown) {
    super(`${label} failed after ${attempts} attempts: ${describeError(cause)}`, false, cause);
    this.name = 'RetryExhaustedError';
  }
}

// Errors from Playwright and the network are retryable unless we marked them otherwise.
export function isRetryable(error: unknown): boolean {
  return error instanceof ScraperError ? error.retryable : true;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
