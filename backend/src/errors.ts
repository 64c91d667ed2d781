export class CapabilityUnavailableError extends Error {
  constructor(
    public readonly capability: string,
    message: string,
  ) {
    super(message);
    this.name = 'CapabilityUnavailableError';
  }
}

export class CapabilityTimeoutError extends Error {
  constructor(
    public readonly capability: string,
    public readonly timeoutMs: number,
  ) {
    super(`${capability} did not answer within ${timeoutMs}ms`);
    this.name = 'CapabilityTimeoutError';
  }
}

export class PerReviewClassificationError extends Error {
  constructor(
    public readonly capability: string,
    public readonly reason: unknown,
  ) {
    super(`${capability} failed for a single review: ${errorMessage(reason)}`);
    this.name = 'PerReviewClassificationError';
  }
}

export class RequestValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message);
    this.name = 'RequestValidationError';
  }
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
