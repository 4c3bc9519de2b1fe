import pino from 'pino';
import { cacheKey } from '../cache/keys.js';
import type { ResultCache } from '../cache/disk-cache.js';
import { ProviderFailureError, ProviderTimeoutError, getErrorMessage } from '../errors.js';
import type { ProviderConfig } from '../types.js';
import type { ProviderAdapter } from './adapter.js';
import { computeBackoffDelay, sleep as defaultSleep } from './backoff.js';
import { CircuitBreaker } from './circuit-breaker.js';
import { TaskCancelledError, runCancellable } from './task.js';

/**
 * What the orchestrator needs from a provider.
 */
export interface ModelProvider {
  readonly name: string;
  invoke(prompt: string, signal?: AbortSignal): Promise<string | null>;
}

export interface ProviderClientDeps {
  adapter: ProviderAdapter;
  breaker: CircuitBreaker;
  cache?: ResultCache;
  cacheTtlMs?: number;        // default: 900000 (15 minutes)
  logger?: pino.Logger;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
}

/**
 * ProviderClient wraps one provider adapter with the resilience policy:
 * cache lookup, circuit breaker, bounded attempts with cancellation, and
 * exponential backoff between attempts.
 *
 * Never throws: every failure collapses to `null` plus a log line.
 */
export class ProviderClient implements ModelProvider {
  readonly name: string;
  private config: ProviderConfig;
  private adapter: ProviderAdapter;
  private breaker: CircuitBreaker;
  private cache?: ResultCache;
  private cacheTtlMs: number;
  private log: pino.Logger;
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private random: () => number;

  constructor(config: ProviderConfig, deps: ProviderClientDeps) {
    this.config = config;
    this.name = config.name;
    this.adapter = deps.adapter;
    this.breaker = deps.breaker;
    this.cache = deps.cache;
    this.cacheTtlMs = deps.cacheTtlMs ?? 900_000;
    this.log = (deps.logger ?? pino({ level: 'silent' })).child({ provider: config.name });
    this.sleep = deps.sleep ?? defaultSleep;
    this.random = deps.random ?? Math.random;
  }

  async invoke(prompt: string, signal?: AbortSignal): Promise<string | null> {
    if (!prompt.trim()) {
      this.log.warn('Refusing to send an empty prompt');
      return null;
    }

    const key = cacheKey(`llm:${this.name}`, { prompt, model: this.config.model });
    const cached = await this.readCache(key);
    if (cached) {
      this.log.debug({ key }, 'Cache hit');
      return cached;
    }

    if (!this.config.apiKey) {
      this.log.warn('No API key configured, skipping provider');
      return null;
    }

    if (!this.breaker.tryAcquire()) {
      this.log.warn(
        { remainingCooldownMs: this.breaker.remainingCooldownMs() },
        'Circuit open, skipping provider'
      );
      return null;
    }

    // A half-open circuit admits a single probing call, with no retries.
    const probing = this.breaker.currentState === 'half_open';
    if (probing) {
      this.log.info('Circuit half-open, sending probe call');
    }
    const maxAttempts = probing ? 1 : this.config.maxRetries + 1;
    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const text = await runCancellable(sig => this.adapter.complete(prompt, sig), {
          timeoutMs: this.config.timeoutMs,
          label: this.name,
          signal,
        });
        if (text.trim()) {
          this.breaker.recordSuccess();
          await this.writeCache(key, text);
          this.log.info({ attempt, chars: text.length }, 'Provider call succeeded');
          return text;
        }
        this.log.warn({ attempt, maxAttempts }, 'Provider returned empty text');
      } catch (err) {
        if (err instanceof TaskCancelledError) {
          this.log.warn({ attempt }, 'Provider call cancelled by caller');
          this.breaker.releaseProbe();
          return null;
        }
        if (err instanceof ProviderTimeoutError) {
          this.log.warn({ attempt, maxAttempts, timeoutMs: this.config.timeoutMs }, 'Provider call timed out');
        } else {
          this.log.warn({ attempt, maxAttempts, err: getErrorMessage(err) }, 'Provider call failed');
          if (err instanceof ProviderFailureError && !err.retryable) {
            break;
          }
        }
      }

      if (attempt < maxAttempts) {
        const delay = computeBackoffDelay(
          attempt,
          { baseMs: this.config.backoffBaseMs, capMs: this.config.backoffCapMs },
          this.random
        );
        this.log.debug({ attempt, delay }, 'Backing off before retry');
        await this.sleep(delay, signal);
        if (signal?.aborted) {
          this.log.warn({ attempt }, 'Caller cancelled during backoff');
          this.breaker.releaseProbe();
          return null;
        }
      }
    }

    this.breaker.recordFailure();
    this.log.error(
      { failures: this.breaker.failures, circuit: this.breaker.currentState },
      'Provider attempts exhausted'
    );
    return null;
  }

  private async readCache(key: string): Promise<string | undefined> {
    if (!this.cache) {
      return undefined;
    }
    try {
      return await this.cache.get(key);
    } catch (err) {
      this.log.warn({ key, err: getErrorMessage(err) }, 'Cache read failed');
      return undefined;
    }
  }

  private async writeCache(key: string, text: string): Promise<void> {
    if (!this.cache) {
      return;
    }
    try {
      await this.cache.set(key, text, this.cacheTtlMs);
    } catch (err) {
      this.log.warn({ key, err: getErrorMessage(err) }, 'Cache write failed');
    }
  }
}
