export class HappinessError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends HappinessError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map(i => `  - ${i}`).join('\n')}`);
  }
}

export class TransportError extends HappinessError {
  constructor(public readonly url: string, cause: unknown) {
    super(`Request to ${url} failed: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}

export class HttpError extends HappinessError {
  constructor(public readonly url: string, public readonly status: number, statusText: string) {
    super(`GET ${url} returned ${status}${statusText ? ` ${statusText}` : ''}`);
  }
}

export class ResponseFormatError extends HappinessError {
  constructor(public readonly url: string, detail: string, cause?: unknown) {
    super(`Unexpected response body from ${url}: ${detail}`, { cause });
  }
}

export class RepositoryError extends HappinessError {
  constructor(public readonly repo: string, cause: unknown) {
    super(`${repo}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
  }
}
