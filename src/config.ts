import * as os from 'os';
import * as path from 'path';
import { ConfigError } from './errors.js';
import type { ProviderConfig, ProviderKind } from './types.js';

export interface BreakerSettings {
  failureThreshold: number;
  cooldownMs: number;
}

export interface OrchestratorSettings {
  maxIterations: number;
  globalBudgetMs: number;
  keepSessionOpen: boolean;
}

export interface SandboxSettings {
  image: string;
  socketPath: string;
  networkMode: string;
  memoryMB: number;
  cpuCount: number;
  execTimeoutMs: number;
  installTimeoutMs: number;
}

export interface CacheSettings {
  dir: string;
  ttlMs: number;
}

export interface AppConfig {
  providers: readonly ProviderConfig[];
  breaker: BreakerSettings;
  orchestrator: OrchestratorSettings;
  sandbox: SandboxSettings;
  cache: CacheSettings;
  maxFileSizeBytes: number;
  logLevel: string;
}

type Env = Record<string, string | undefined>;

interface ProviderPreset {
  kind: ProviderKind;
  envPrefix: string;
  model: string;
  baseUrl: string;
}

// Provider names accepted in PROVIDER_ORDER
const PROVIDER_PRESETS: Record<string, ProviderPreset> = {
  nvidia: {
    kind: 'openai-compatible',
    envPrefix: 'NVIDIA',
    model: 'nvidia/llama-3.3-nemotron-super-49b-v1.5',
    baseUrl: 'https://integrate.api.nvidia.com/v1',
  },
  gemini: {
    kind: 'gemini',
    envPrefix: 'GEMINI',
    model: 'gemini-2.5-flash',
    baseUrl: 'https://generativelanguage.googleapis.com/v1beta',
  },
  openai: {
    kind: 'openai-compatible',
    envPrefix: 'OPENAI',
    model: 'gpt-5',
    baseUrl: 'https://api.openai.com/v1',
  },
  anthropic: {
    kind: 'anthropic',
    envPrefix: 'ANTHROPIC',
    model: 'claude-sonnet-4-5-20250929',
    baseUrl: 'https://api.anthropic.com',
  },
};

export const DEFAULT_PROVIDER_ORDER = ['nvidia', 'gemini', 'openai'];

const parseNumber = (value: string | undefined, fallback: number): number => {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
};

const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined) {
    return fallback;
  }
  return ['1', 'true', 'yes', 'on'].includes(value.toLowerCase());
};

const seconds = (value: string | undefined, fallbackSeconds: number): number =>
  Math.round(parseNumber(value, fallbackSeconds) * 1000);

export function parseProviderOrder(value: string | undefined): string[] {
  if (!value || !value.trim()) {
    return [...DEFAULT_PROVIDER_ORDER];
  }
  const names = value.split(',').map(name => name.trim().toLowerCase()).filter(Boolean);
  for (const name of names) {
    if (!(name in PROVIDER_PRESETS)) {
      throw new ConfigError(
        `Unknown provider '${name}'. Supported: ${Object.keys(PROVIDER_PRESETS).join(', ')}`
      );
    }
  }
  return [...new Set(names)];
}

function buildProviderConfig(name: string, env: Env): ProviderConfig {
  const preset = PROVIDER_PRESETS[name];
  const prefix = preset.envPrefix;
  return Object.freeze({
    name,
    kind: preset.kind,
    model: env[`${prefix}_MODEL`] || preset.model,
    apiKey: env[`${prefix}_API_KEY`] || undefined,
    baseUrl: (env[`${prefix}_BASE_URL`] || preset.baseUrl).replace(/\/+$/, ''),
    timeoutMs: seconds(env.LLM_PER_PROVIDER_TIMEOUT_SEC, 60),
    maxRetries: Math.max(0, Math.floor(parseNumber(env.LLM_MAX_RETRIES, 2))),
    backoffBaseMs: seconds(env.LLM_BACKOFF_BASE_SEC, 1),
    backoffCapMs: seconds(env.LLM_BACKOFF_CAP_SEC, 8),
    maxTokens: parseNumber(env.LLM_MAX_TOKENS, 4096),
    temperature: parseNumber(env.LLM_TEMPERATURE, 0.2),
  });
}

/**
 * Resolve runtime configuration from environment variables.
 * Malformed numbers fall back to defaults; unknown provider names throw ConfigError.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const providers = parseProviderOrder(env.PROVIDER_ORDER).map(name => buildProviderConfig(name, env));

  return {
    providers,
    breaker: {
      failureThreshold: Math.max(1, parseNumber(env.BREAKER_FAILURE_THRESHOLD, 3)),
      cooldownMs: seconds(env.BREAKER_COOLDOWN_SEC, 120),
    },
    orchestrator: {
      maxIterations: Math.max(1, Math.floor(parseNumber(env.MAX_FEEDBACK_ITERATIONS, 9))),
      globalBudgetMs: seconds(env.LLM_GLOBAL_BUDGET_SEC, 300),
      keepSessionOpen: parseBoolean(env.SANDBOX_KEEP_SESSION_OPEN, true),
    },
    sandbox: {
      image: env.SANDBOX_IMAGE || env.MCP_PYTHON_IMAGE || 'python:3.11-slim',
      socketPath: env.DOCKER_SOCKET || '/var/run/docker.sock',
      networkMode: env.SANDBOX_NETWORK || 'bridge',
      memoryMB: parseNumber(env.SANDBOX_MEMORY_MB, 1024),
      cpuCount: parseNumber(env.SANDBOX_CPUS, 1),
      execTimeoutMs: seconds(env.CODE_EXEC_TIMEOUT, 60),
      installTimeoutMs: seconds(env.PIP_INSTALL_TIMEOUT, 60),
    },
    cache: {
      dir: env.CACHE_DIR || path.join(os.tmpdir(), 'analyst_cache'),
      ttlMs: seconds(env.LLM_CACHE_TTL_SEC, 900),
    },
    maxFileSizeBytes: parseNumber(env.MAX_FILE_SIZE_MB, 50) * 1024 * 1024,
    logLevel: env.LOG_LEVEL || 'info',
  };
}
