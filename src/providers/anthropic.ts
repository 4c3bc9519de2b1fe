import Anthropic from '@anthropic-ai/sdk';
import { ProviderFailureError } from '../errors.js';
import type { ProviderConfig } from '../types.js';
import { ProviderAdapter, isRetryableStatus } from './adapter.js';

/**
 * Anthropic Messages API adapter.
 *
 * SDK-level retries are disabled: retry, backoff and circuit breaking belong to
 * ProviderClient so every provider follows the same policy.
 */
export class AnthropicAdapter implements ProviderAdapter {
  readonly name: string;
  readonly model: string;
  private client: Anthropic;
  private maxTokens: number;
  private temperature: number;

  constructor(config: ProviderConfig) {
    this.name = config.name;
    this.model = config.model;
    this.maxTokens = config.maxTokens;
    this.temperature = config.temperature;
    this.client = new Anthropic({
      apiKey: config.apiKey,
      baseURL: config.baseUrl,
      maxRetries: 0,
      timeout: config.timeoutMs,
    });
  }

  async complete(prompt: string, signal: AbortSignal): Promise<string> {
    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: this.maxTokens,
          temperature: this.temperature,
          messages: [{ role: 'user', content: prompt }],
        },
        { signal }
      );
    } catch (error) {
      if (error instanceof Anthropic.APIError && typeof error.status === 'number') {
        throw new ProviderFailureError(this.name, `Anthropic API error (${error.status}): ${error.message}`, {
          status: error.status,
          retryable: isRetryableStatus(error.status),
        });
      }
      throw error;
    }

    if (response.stop_reason === 'max_tokens') {
      throw new ProviderFailureError(this.name, 'Reply truncated at max_tokens', { retryable: false });
    }

    return response.content
      .filter((block): block is Anthropic.TextBlock => block.type === 'text')
      .map(block => block.text)
      .join('\n')
      .trim();
  }
}
