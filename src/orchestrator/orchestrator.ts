import { randomUUID } from 'crypto';
import pino from 'pino';
import { systemClock } from '../clock.js';
import type { Clock } from '../clock.js';
import {
  AllProvidersExhaustedError,
  DeadlineExceededError,
  IterationLimitError,
  ProviderUnavailableError,
  getErrorMessage,
} from '../errors.js';
import type { ModelProvider } from '../providers/client.js';
import type { SandboxProvider } from '../sandbox/executor.js';
import type {
  AnalysisResponseBody,
  AnalysisResult,
  AttemptStatus,
  AttemptSummary,
  FileManifest,
  IterationRecord,
} from '../types.js';
import { buildContinuationPrompt, buildFeedbackPrompt, buildInitialPrompt } from './feedback.js';
import type { MetricsCollector } from './metrics.js';
import { parseResponse } from './parser.js';

export interface OrchestratorOptions {
  providers: readonly ModelProvider[];
  sandbox: SandboxProvider;
  maxIterations?: number;     // default: 9
  globalBudgetMs?: number;    // default: 300000 (per provider attempt)
  keepSessionOpen?: boolean;  // default: true
  clock?: Clock;
  logger?: pino.Logger;
  metrics?: MetricsCollector;
}

interface AttemptProgress {
  iterations: number;
}

interface AttemptSuccess {
  finalAnswer: unknown;
  iterations: number;
}

function statusFor(error: unknown): AttemptStatus {
  if (error instanceof DeadlineExceededError) return 'deadline_exceeded';
  if (error instanceof IterationLimitError) return 'iteration_limit';
  if (error instanceof ProviderUnavailableError) return 'provider_failed';
  return 'failed';
}

/**
 * FeedbackOrchestrator drives the answer/execute loop against each provider in
 * turn until one produces a final answer.
 *
 * Per provider attempt:
 * - Own iteration counter and deadline; the deadline also aborts the in-flight call
 * - Own sandbox session keyed `<requestId>:<provider>`, closed when the attempt ends
 * - History lives only for the attempt; the next provider starts from the initial prompt
 *
 * Attempt failures never escape: they are summarized and the next provider is tried.
 */
export class FeedbackOrchestrator {
  private providers: readonly ModelProvider[];
  private sandbox: SandboxProvider;
  private maxIterations: number;
  private globalBudgetMs: number;
  private keepSessionOpen: boolean;
  private clock: Clock;
  private log: pino.Logger;
  private metrics?: MetricsCollector;
  private active = new Map<string, AbortController>();

  constructor(options: OrchestratorOptions) {
    this.providers = options.providers;
    this.sandbox = options.sandbox;
    this.maxIterations = options.maxIterations ?? 9;
    this.globalBudgetMs = options.globalBudgetMs ?? 300_000;
    this.keepSessionOpen = options.keepSessionOpen ?? true;
    this.clock = options.clock ?? systemClock;
    this.log = (options.logger ?? pino({ level: 'silent' })).child({ component: 'orchestrator' });
    this.metrics = options.metrics;
  }

  /**
   * Abort every running attempt and close its sandbox session.
   * Called from signal handlers so containers do not outlive the process.
   */
  async stop(): Promise<void> {
    const ids = [...this.active.keys()];
    for (const controller of this.active.values()) {
      controller.abort();
    }
    this.active.clear();
    await Promise.all(ids.map(id => this.sandbox.releaseSession(id)));
  }

  async run(question: string, manifest: FileManifest, requestId: string = randomUUID()): Promise<AnalysisResult> {
    const initialPrompt = buildInitialPrompt(question, Object.keys(manifest));
    const attempts: AttemptSummary[] = [];

    for (const provider of this.providers) {
      const log = this.log.child({ requestId, provider: provider.name });
      const progress: AttemptProgress = { iterations: 0 };
      const startedAt = this.clock.now();
      log.info('Starting provider attempt');

      try {
        const outcome = await this.runAttempt(provider, initialPrompt, manifest, requestId, progress, log);
        const summary = this.summarize(provider.name, 'success', outcome.iterations, startedAt);
        attempts.push(summary);
        log.info({ iterations: outcome.iterations }, 'Final answer received');
        return {
          success: true,
          finalAnswer: outcome.finalAnswer,
          apiUsed: provider.name,
          iterations: outcome.iterations,
          error: null,
          attempts,
        };
      } catch (err) {
        const status = statusFor(err);
        const message = getErrorMessage(err);
        attempts.push(this.summarize(provider.name, status, progress.iterations, startedAt, message));
        if (status === 'failed') {
          log.error({ err }, 'Attempt failed unexpectedly, trying next provider');
        } else {
          log.warn({ status, error: message }, 'Attempt failed, trying next provider');
        }
      }
    }

    const exhausted = new AllProvidersExhaustedError(this.providers.map(p => p.name));
    this.log.error({ requestId, attempts: attempts.length }, exhausted.message);
    return {
      success: false,
      finalAnswer: null,
      apiUsed: null,
      iterations: null,
      error: exhausted.message,
      attempts,
    };
  }

  private async runAttempt(
    provider: ModelProvider,
    initialPrompt: string,
    manifest: FileManifest,
    requestId: string,
    progress: AttemptProgress,
    log: pino.Logger
  ): Promise<AttemptSuccess> {
    const sessionId = `${requestId}:${provider.name}`;
    const deadline = this.clock.now() + this.globalBudgetMs;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.globalBudgetMs);
    timer.unref();
    this.active.set(sessionId, controller);

    const session = this.sandbox.openSession(sessionId);
    const history: IterationRecord[] = [];
    let prompt = initialPrompt;

    try {
      for (let iteration = 1; iteration <= this.maxIterations; iteration++) {
        if (controller.signal.aborted || this.clock.now() >= deadline) {
          throw new DeadlineExceededError(provider.name);
        }
        progress.iterations = iteration;
        log.debug({ iteration, promptChars: prompt.length }, 'Calling provider');

        const output = await provider.invoke(prompt, controller.signal);
        if (output === null) {
          if (controller.signal.aborted) {
            throw new DeadlineExceededError(provider.name);
          }
          throw new ProviderUnavailableError(provider.name);
        }

        const parsed = parseResponse(output);
        log.info({ iteration, kind: parsed.kind }, 'Parsed provider reply');

        switch (parsed.kind) {
          case 'final_answer':
            return { finalAnswer: parsed.value, iterations: iteration };

          case 'code': {
            const execution = await session.execute(parsed.codeBlocks, manifest, {
              keepSessionOpen: this.keepSessionOpen,
            });
            log.info({ iteration, success: execution.success, exitCode: execution.exitCode }, 'Code executed');
            history.push({ iteration, rawOutput: output, execution });
            prompt = buildFeedbackPrompt(initialPrompt, history);
            break;
          }

          case 'continuation':
            prompt = buildContinuationPrompt(initialPrompt, output);
            break;
        }
      }

      throw new IterationLimitError(this.maxIterations, provider.name);
    } finally {
      clearTimeout(timer);
      this.active.delete(sessionId);
      await this.sandbox.releaseSession(sessionId);
    }
  }

  private summarize(
    provider: string,
    status: AttemptStatus,
    iterations: number,
    startedAt: number,
    error?: string
  ): AttemptSummary {
    const summary: AttemptSummary = {
      provider,
      status,
      iterations,
      durationMs: Math.round(this.clock.now() - startedAt),
    };
    if (error !== undefined) {
      summary.error = error;
    }
    this.metrics?.recordAttempt(summary);
    return summary;
  }
}

/**
 * Wire shape of a result: snake_case keys, attempt details left out.
 */
export function toResponseBody(result: AnalysisResult): AnalysisResponseBody {
  return {
    success: result.success,
    final_answer: result.finalAnswer,
    api_used: result.apiUsed,
    iterations: result.iterations,
    error: result.error,
  };
}
