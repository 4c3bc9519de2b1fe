import { describe, it, expect } from 'vitest';
import * as os from 'os';
import * as path from 'path';
import { loadConfig, parseProviderOrder } from './config.js';
import { ConfigError } from './errors.js';

describe('parseProviderOrder', () => {
  it('defaults to nvidia, gemini, openai', () => {
    expect(parseProviderOrder(undefined)).toEqual(['nvidia', 'gemini', 'openai']);
    expect(parseProviderOrder('  ')).toEqual(['nvidia', 'gemini', 'openai']);
  });

  it('normalizes case and drops duplicates', () => {
    expect(parseProviderOrder(' Gemini, anthropic,gemini ')).toEqual(['gemini', 'anthropic']);
  });

  it('rejects unknown providers', () => {
    expect(() => parseProviderOrder('gemini,mistral')).toThrow(ConfigError);
    expect(() => parseProviderOrder('mistral')).toThrow(/Unknown provider 'mistral'/);
  });
});

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.providers.map(p => p.name)).toEqual(['nvidia', 'gemini', 'openai']);
    expect(config.providers[0]).toEqual({
      name: 'nvidia',
      kind: 'openai-compatible',
      model: 'nvidia/llama-3.3-nemotron-super-49b-v1.5',
      apiKey: undefined,
      baseUrl: 'https://integrate.api.nvidia.com/v1',
      timeoutMs: 60_000,
      maxRetries: 2,
      backoffBaseMs: 1000,
      backoffCapMs: 8000,
      maxTokens: 4096,
      temperature: 0.2,
    });
    expect(config.breaker).toEqual({ failureThreshold: 3, cooldownMs: 120_000 });
    expect(config.orchestrator).toEqual({ maxIterations: 9, globalBudgetMs: 300_000, keepSessionOpen: true });
    expect(config.sandbox).toEqual({
      image: 'python:3.11-slim',
      socketPath: '/var/run/docker.sock',
      networkMode: 'bridge',
      memoryMB: 1024,
      cpuCount: 1,
      execTimeoutMs: 60_000,
      installTimeoutMs: 60_000,
    });
    expect(config.cache).toEqual({ dir: path.join(os.tmpdir(), 'analyst_cache'), ttlMs: 900_000 });
    expect(config.maxFileSizeBytes).toBe(50 * 1024 * 1024);
    expect(config.logLevel).toBe('info');
  });

  it('reads overrides and per-provider settings', () => {
    const config = loadConfig({
      PROVIDER_ORDER: 'gemini',
      GEMINI_API_KEY: 'test-secret',
      GEMINI_MODEL: 'gemini-test',
      GEMINI_BASE_URL: 'http://gemini.local/v1beta/',
      LLM_PER_PROVIDER_TIMEOUT_SEC: '2.5',
      MAX_FEEDBACK_ITERATIONS: '4',
      SANDBOX_KEEP_SESSION_OPEN: 'false',
      CODE_EXEC_TIMEOUT: '30',
    });

    expect(config.providers).toHaveLength(1);
    expect(config.providers[0].apiKey).toBe('test-secret');
    expect(config.providers[0].model).toBe('gemini-test');
    expect(config.providers[0].baseUrl).toBe('http://gemini.local/v1beta');
    expect(config.providers[0].timeoutMs).toBe(2500);
    expect(config.orchestrator.maxIterations).toBe(4);
    expect(config.orchestrator.keepSessionOpen).toBe(false);
    expect(config.sandbox.execTimeoutMs).toBe(30_000);
  });

  it('falls back to defaults for malformed numbers', () => {
    const config = loadConfig({ LLM_MAX_RETRIES: 'many', BREAKER_COOLDOWN_SEC: 'soon' });
    expect(config.providers[0].maxRetries).toBe(2);
    expect(config.breaker.cooldownMs).toBe(120_000);
  });

  it('freezes provider configs', () => {
    expect(Object.isFrozen(loadConfig({}).providers[0])).toBe(true);
  });
});
