/**
 * Custom error classes for typed error handling.
 * Use instanceof checks instead of fragile string matching.
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class ProviderTimeoutError extends Error {
  constructor(provider: string, timeoutMs: number) {
    super(`${provider} call timed out after ${timeoutMs}ms`);
    this.name = 'ProviderTimeoutError';
  }
}

export class ProviderFailureError extends Error {
  readonly status?: number;
  readonly retryable: boolean;

  constructor(provider: string, message: string, options: { status?: number; retryable?: boolean } = {}) {
    super(`${provider}: ${message}`);
    this.name = 'ProviderFailureError';
    this.status = options.status;
    this.retryable = options.retryable ?? true;
  }
}

export class ProviderUnavailableError extends Error {
  constructor(provider: string) {
    super(`${provider} API returned no response`);
    this.name = 'ProviderUnavailableError';
  }
}

export class DeadlineExceededError extends Error {
  constructor(provider: string) {
    super(`Global deadline exceeded for ${provider}`);
    this.name = 'DeadlineExceededError';
  }
}

export class IterationLimitError extends Error {
  constructor(maxIterations: number, provider: string) {
    super(`Maximum iterations (${maxIterations}) reached for ${provider}`);
    this.name = 'IterationLimitError';
  }
}

export class AllProvidersExhaustedError extends Error {
  readonly providers: string[];

  constructor(providers: string[]) {
    super(`All APIs (${providers.join(', ')}) failed to provide a response`);
    this.name = 'AllProvidersExhaustedError';
    this.providers = providers;
  }
}

export class ExecutionTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Command timed out after ${timeoutMs}ms`);
    this.name = 'ExecutionTimeoutError';
  }
}

export class SandboxProvisionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(`Sandbox provisioning failed: ${message}`, options);
    this.name = 'SandboxProvisionError';
  }
}

/**
 * Extract error message safely without exposing internal details
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
