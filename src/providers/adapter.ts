import { ProviderFailureError } from '../errors.js';

/**
 * Wire protocol for one provider family. Implementations send a single prompt
 * and return the reply text; they must honour the AbortSignal.
 */
export interface ProviderAdapter {
  readonly name: string;
  readonly model: string;
  complete(prompt: string, signal: AbortSignal): Promise<string>;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Rate limits and server errors are worth retrying; auth, billing and bad
 * requests are not.
 */
export function isRetryableStatus(status: number): boolean {
  return status === 408 || status === 429 || status >= 500;
}

export async function failureFromResponse(provider: string, response: Response): Promise<ProviderFailureError> {
  let body = '';
  try {
    body = (await response.text()).slice(0, 200);
  } catch {
    body = '(unreadable body)';
  }
  return new ProviderFailureError(provider, `HTTP ${response.status}: ${body}`, {
    status: response.status,
    retryable: isRetryableStatus(response.status),
  });
}

export async function readJson(provider: string, response: Response): Promise<unknown> {
  try {
    return await response.json();
  } catch (error) {
    throw new ProviderFailureError(
      provider,
      `Malformed JSON response: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
