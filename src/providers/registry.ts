import pino from 'pino';
import type { ResultCache } from '../cache/disk-cache.js';
import type { BreakerSettings } from '../config.js';
import type { ProviderConfig } from '../types.js';
import type { ProviderAdapter } from './adapter.js';
import { AnthropicAdapter } from './anthropic.js';
import { CircuitBreaker } from './circuit-breaker.js';
import { ProviderClient } from './client.js';
import { GeminiAdapter } from './gemini.js';
import { OpenAICompatibleAdapter } from './openai-compatible.js';

export function createAdapter(config: ProviderConfig): ProviderAdapter {
  switch (config.kind) {
    case 'openai-compatible':
      return new OpenAICompatibleAdapter(config);
    case 'gemini':
      return new GeminiAdapter(config);
    case 'anthropic':
      return new AnthropicAdapter(config);
  }
}

/**
 * Build one ProviderClient per configured provider, preserving order.
 * Each client owns a breaker for the life of the process.
 */
export function createProviderClients(
  providers: readonly ProviderConfig[],
  options: { breaker: BreakerSettings; cache?: ResultCache; cacheTtlMs?: number; logger?: pino.Logger }
): ProviderClient[] {
  return providers.map(config => new ProviderClient(config, {
    adapter: createAdapter(config),
    breaker: new CircuitBreaker({
      failureThreshold: options.breaker.failureThreshold,
      cooldownMs: options.breaker.cooldownMs,
    }),
    cache: options.cache,
    cacheTtlMs: options.cacheTtlMs,
    logger: options.logger,
  }));
}
