export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class DeadlineExceededError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`${operation} did not finish within ${timeoutMs}ms.`);
    this.name = 'DeadlineExceededError';
  }
}

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : String(error));
