export class PostwatchError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'PostwatchError';
  }
}

export class ConfigError extends PostwatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends PostwatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class DbError extends PostwatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

/**
 * The provider answered in a way the client does not understand
 * (unexpected status, malformed body). Distinct from the quota and
 * server-error results, which are part of the provider contract.
 */
export class ProviderError extends PostwatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'PROVIDER_ERROR', details);
    this.name = 'ProviderError';
  }
}

export class LlmError extends PostwatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'LLM_ERROR', details);
    this.name = 'LlmError';
  }
}

export class NotifyError extends PostwatchError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'NOTIFY_ERROR', details);
    this.name = 'NotifyError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
