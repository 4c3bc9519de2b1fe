/**
 * Library entry point
 *
 * The CLI (src/cli) is the shipped front door; these exports let another host
 * (an HTTP server, a job worker) wire the same pieces together.
 */

export { AnalystService } from './analyst.js';
export { DiskCache } from './cache/disk-cache.js';
export { cacheKey, hashJson, stableStringify } from './cache/keys.js';
export { loadConfig, parseProviderOrder, DEFAULT_PROVIDER_ORDER } from './config.js';
export { prepareRequest, sanitizeFilename } from './intake/uploads.js';
export { FeedbackOrchestrator, toResponseBody } from './orchestrator/orchestrator.js';
export { MetricsCollector } from './orchestrator/metrics.js';
export { parseResponse, DEFAULT_TIERS } from './orchestrator/parser.js';
export { CircuitBreaker } from './providers/circuit-breaker.js';
export { ProviderClient } from './providers/client.js';
export { createAdapter, createProviderClients } from './providers/registry.js';
export { SandboxExecutor } from './sandbox/executor.js';
export { SandboxSession } from './sandbox/session.js';
export * from './errors.js';
export type { AnalystResponse, AnalystServiceOptions } from './analyst.js';
export type { ResultCache } from './cache/disk-cache.js';
export type { AppConfig } from './config.js';
export type { PreparedRequest } from './intake/uploads.js';
export type { OrchestratorOptions } from './orchestrator/orchestrator.js';
export type { ComputedMetrics } from './orchestrator/metrics.js';
export type { ParseTier } from './orchestrator/parser.js';
export type { ModelProvider } from './providers/client.js';
export type { ProviderAdapter } from './providers/adapter.js';
export type { SandboxProvider } from './sandbox/executor.js';
export type { ScriptRunner } from './sandbox/session.js';
export type * from './types.js';
