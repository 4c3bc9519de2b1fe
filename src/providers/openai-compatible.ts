import type { ProviderConfig } from '../types.js';
import { ProviderAdapter, failureFromResponse, isRecord, readJson } from './adapter.js';

/**
 * Extract the assistant text from a chat-completions body:
 * { choices: [{ message: { content: "..." } }] }
 */
export function extractChatCompletionText(body: unknown): string {
  if (!isRecord(body) || !Array.isArray(body.choices)) {
    return '';
  }
  const first: unknown = body.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) {
    return '';
  }
  const content = first.message.content;
  return typeof content === 'string' ? content : '';
}

/**
 * Chat-completions adapter for OpenAI and OpenAI-compatible hosts (NVIDIA NIM).
 */
export class OpenAICompatibleAdapter implements ProviderAdapter {
  readonly name: string;
  readonly model: string;
  private config: ProviderConfig;

  constructor(config: ProviderConfig) {
    this.config = config;
    this.name = config.name;
    this.model = config.model;
  }

  async complete(prompt: string, signal: AbortSignal): Promise<string> {
    const response = await fetch(`${this.config.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${this.config.apiKey ?? ''}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        model: this.config.model,
        messages: [{ role: 'user', content: prompt }],
        temperature: this.config.temperature,
        max_tokens: this.config.maxTokens,
      }),
      signal,
    });

    if (!response.ok) {
      throw await failureFromResponse(this.name, response);
    }

    return extractChatCompletionText(await readJson(this.name, response)).trim();
  }
}
