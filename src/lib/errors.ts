export class UsageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigNotFoundError extends UsageError {
  readonly path: string;

  constructor(path: string) {
    super(`Config file not found: ${path}`);
    this.path = path;
  }
}

export class ConfigError extends UsageError {
  readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(`Invalid config file ${path}: ${reason}`, options);
    this.path = path;
  }
}

export class UnknownProviderError extends UsageError {
  readonly provider: string;

  constructor(provider: string) {
    super(`Unknown provider: ${provider}`);
    this.provider = provider;
  }
}

export class NotAuthenticatedError extends UsageError {
  constructor(provider: string) {
    super(`${provider}: authenticate() must be called before fetchUsage().`);
  }
}

export class TransportError extends UsageError {}

export class HttpStatusError extends UsageError {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.status = status;
  }
}

/** The provider answered 2xx but flagged the request as failed in its envelope. */
export class ProviderApiError extends UsageError {}

export class ValidationError extends UsageError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join("; ")}` : message);
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
