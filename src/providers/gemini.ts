import type { ProviderConfig } from '../types.js';
import { ProviderAdapter, failureFromResponse, isRecord, readJson } from './adapter.js';

/**
 * Concatenate the text parts of the first candidate:
 * { candidates: [{ content: { parts: [{ text: "..." }] } }] }
 */
export function extractGeminiText(body: unknown): string {
  if (!isRecord(body) || !Array.isArray(body.candidates)) {
    return '';
  }
  const candidate: unknown = body.candidates[0];
  if (!isRecord(candidate) || !isRecord(candidate.content) || !Array.isArray(candidate.content.parts)) {
    return '';
  }
  return candidate.content.parts
    .map((part: unknown) => (isRecord(part) && typeof part.text === 'string' ? part.text : ''))
    .join('');
}

export class GeminiAdapter implements ProviderAdapter {
  readonly name: string;
  readonly model: string;
  private config: ProviderConfig;

  constructor(config: ProviderConfig) {
    this.config = config;
    this.name = config.name;
    this.model = config.model;
  }

  async complete(prompt: string, signal: AbortSignal): Promise<string> {
    const url = `${this.config.baseUrl}/models/${encodeURIComponent(this.config.model)}:generateContent`;
    const response = await fetch(url, {
      method: 'POST',
      headers: {
        'x-goog-api-key': this.config.apiKey ?? '',
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        generationConfig: {
          temperature: this.config.temperature,
          maxOutputTokens: this.config.maxTokens,
        },
      }),
      signal,
    });

    if (!response.ok) {
      throw await failureFromResponse(this.name, response);
    }

    return extractGeminiText(await readJson(this.name, response)).trim();
  }
}
