import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Clock } from '../clock.js';
import type { ModelProvider } from '../providers/client.js';
import type { SandboxProvider } from '../sandbox/executor.js';
import type { ScriptRunner } from '../sandbox/session.js';
import type { AnalysisResult } from '../types.js';
import { buildInitialPrompt } from './feedback.js';
import { MetricsCollector } from './metrics.js';
import { FeedbackOrchestrator, toResponseBody } from './orchestrator.js';

class ManualClock implements Clock {
  private t = 0;
  now(): number {
    return this.t;
  }
  advance(ms: number): void {
    this.t += ms;
  }
}

class FakeSandbox implements SandboxProvider {
  opened: string[] = [];
  released: string[] = [];
  execute = vi.fn<ScriptRunner['execute']>();

  openSession(id: string): ScriptRunner {
    this.opened.push(id);
    return { id, isActive: false, execute: this.execute, close: async () => {} };
  }

  async releaseSession(id: string): Promise<void> {
    this.released.push(id);
  }
}

type Invoke = (prompt: string, signal?: AbortSignal) => Promise<string | null>;

function makeProvider(name: string, ...replies: Array<string | null>) {
  const invoke = vi.fn<Invoke>();
  for (const reply of replies) {
    invoke.mockResolvedValueOnce(reply);
  }
  const provider: ModelProvider = { name, invoke };
  return { provider, invoke };
}

const manifest = { 'sales.csv': '/tmp/staging/sales.csv' };
const initialPrompt = buildInitialPrompt('What is the total?', ['sales.csv']);

describe('FeedbackOrchestrator', () => {
  let clock: ManualClock;
  let sandbox: FakeSandbox;

  beforeEach(() => {
    clock = new ManualClock();
    sandbox = new FakeSandbox();
    sandbox.execute.mockResolvedValue({ success: true, stdout: '1', stderr: '', exitCode: 0 });
  });

  function makeOrchestrator(providers: ModelProvider[], overrides: { maxIterations?: number; globalBudgetMs?: number; metrics?: MetricsCollector } = {}) {
    return new FeedbackOrchestrator({ providers, sandbox, clock, ...overrides });
  }

  it('1. returns the first final answer from the first provider', async () => {
    const nvidia = makeProvider('nvidia', '{"final answer": "42"}');
    const gemini = makeProvider('gemini');

    const result = await makeOrchestrator([nvidia.provider, gemini.provider]).run('What is the total?', manifest, 'req-1');

    expect(result).toEqual({
      success: true,
      finalAnswer: '42',
      apiUsed: 'nvidia',
      iterations: 1,
      error: null,
      attempts: [{ provider: 'nvidia', status: 'success', iterations: 1, durationMs: 0 }],
    });
    expect(nvidia.invoke.mock.calls[0][0]).toBe(initialPrompt);
    expect(gemini.invoke).not.toHaveBeenCalled();
    expect(sandbox.execute).not.toHaveBeenCalled();
    expect(sandbox.opened).toEqual(['req-1:nvidia']);
    expect(sandbox.released).toEqual(['req-1:nvidia']);
  });

  it('2. executes code and feeds the result back before the final answer', async () => {
    const nvidia = makeProvider('nvidia', '{"code": ["import pandas", "print(1)"]}', '{"final answer": 1}');

    const result = await makeOrchestrator([nvidia.provider]).run('What is the total?', manifest, 'req-1');

    expect(result.success).toBe(true);
    expect(result.finalAnswer).toBe(1);
    expect(result.iterations).toBe(2);
    expect(sandbox.execute).toHaveBeenCalledWith(['import pandas', 'print(1)'], manifest, { keepSessionOpen: true });
    const followup = nvidia.invoke.mock.calls[1][0];
    expect(followup.startsWith(`Original Question:\n${initialPrompt}\n\nHere is the full history`)).toBe(true);
    expect(followup).toContain('Model output:\n{"code": ["import pandas", "print(1)"]}');
    expect(followup).toContain('"stdout": "1"');
  });

  it('3. falls back to the next provider when one returns nothing', async () => {
    const nvidia = makeProvider('nvidia', null);
    const gemini = makeProvider('gemini', '{"final answer": "ok"}');

    const result = await makeOrchestrator([nvidia.provider, gemini.provider]).run('What is the total?', manifest, 'req-1');

    expect(result.apiUsed).toBe('gemini');
    expect(result.attempts).toEqual([
      { provider: 'nvidia', status: 'provider_failed', iterations: 1, durationMs: 0, error: 'nvidia API returned no response' },
      { provider: 'gemini', status: 'success', iterations: 1, durationMs: 0 },
    ]);
    expect(gemini.invoke.mock.calls[0][0]).toBe(initialPrompt);
    expect(sandbox.released).toEqual(['req-1:nvidia', 'req-1:gemini']);
  });

  it('4. asks again with the previous reply after a continuation', async () => {
    const nvidia = makeProvider('nvidia', 'Let me think.', '{"final answer": "done"}');

    const result = await makeOrchestrator([nvidia.provider]).run('What is the total?', manifest);

    expect(result.iterations).toBe(2);
    expect(nvidia.invoke.mock.calls[1][0]).toBe(
      `${initialPrompt}\n\nPrevious response:\nLet me think.\n\nPlease provide the final answer or executable code.`
    );
  });

  it('5. stops an attempt at the iteration cap', async () => {
    const nvidia = makeProvider('nvidia', 'hmm', 'hmm', 'hmm', 'hmm');

    const result = await makeOrchestrator([nvidia.provider], { maxIterations: 3 }).run('What is the total?', manifest);

    expect(nvidia.invoke).toHaveBeenCalledTimes(3);
    expect(result).toEqual({
      success: false,
      finalAnswer: null,
      apiUsed: null,
      iterations: null,
      error: 'All APIs (nvidia) failed to provide a response',
      attempts: [
        {
          provider: 'nvidia',
          status: 'iteration_limit',
          iterations: 3,
          durationMs: 0,
          error: 'Maximum iterations (3) reached for nvidia',
        },
      ],
    });
  });

  it('6. fails an attempt once its deadline has passed', async () => {
    const nvidia = makeProvider('nvidia');
    nvidia.invoke.mockImplementation(async () => {
      clock.advance(1000);
      return 'still working';
    });
    const gemini = makeProvider('gemini', '{"final answer": "fast"}');

    const result = await makeOrchestrator([nvidia.provider, gemini.provider], { globalBudgetMs: 1000 }).run(
      'What is the total?',
      manifest
    );

    expect(nvidia.invoke).toHaveBeenCalledTimes(1);
    expect(result.attempts[0]).toEqual({
      provider: 'nvidia',
      status: 'deadline_exceeded',
      iterations: 1,
      durationMs: 1000,
      error: 'Global deadline exceeded for nvidia',
    });
    expect(result.apiUsed).toBe('gemini');
  });

  it('7. aborts the in-flight call when the deadline fires', async () => {
    const nvidia = makeProvider('nvidia');
    nvidia.invoke.mockImplementation(
      (_prompt, signal) =>
        new Promise(resolve => {
          signal?.addEventListener('abort', () => resolve(null), { once: true });
        })
    );

    const result = await makeOrchestrator([nvidia.provider], { globalBudgetMs: 20 }).run('What is the total?', manifest);

    expect(nvidia.invoke.mock.calls[0][1]?.aborted).toBe(true);
    expect(result.attempts[0].status).toBe('deadline_exceeded');
  });

  it('8. records unexpected errors and moves on', async () => {
    const nvidia = makeProvider('nvidia');
    nvidia.invoke.mockRejectedValue(new Error('bug'));
    const gemini = makeProvider('gemini', '{"final answer": "ok"}');

    const result = await makeOrchestrator([nvidia.provider, gemini.provider]).run('What is the total?', manifest);

    expect(result.attempts[0]).toMatchObject({ provider: 'nvidia', status: 'failed', error: 'bug' });
    expect(result.success).toBe(true);
  });

  it('9. lists every provider when all of them fail', async () => {
    const providers = ['nvidia', 'gemini', 'openai'].map(name => makeProvider(name, null).provider);

    const result = await makeOrchestrator(providers).run('What is the total?', manifest, 'req-9');

    expect(result.error).toBe('All APIs (nvidia, gemini, openai) failed to provide a response');
    expect(result.attempts.map(a => a.status)).toEqual(['provider_failed', 'provider_failed', 'provider_failed']);
    expect(sandbox.released).toEqual(['req-9:nvidia', 'req-9:gemini', 'req-9:openai']);
  });

  it('10. closes the session even when execution throws', async () => {
    const nvidia = makeProvider('nvidia', '{"code": "print(1)"}');
    sandbox.execute.mockRejectedValue(new Error('sandbox exploded'));

    const result = await makeOrchestrator([nvidia.provider]).run('What is the total?', manifest, 'req-3');

    expect(result.attempts[0]).toMatchObject({ status: 'failed', error: 'sandbox exploded' });
    expect(sandbox.released).toEqual(['req-3:nvidia']);
  });

  it('11. feeds attempt outcomes to the metrics collector', async () => {
    const metrics = new MetricsCollector();
    const nvidia = makeProvider('nvidia', null);
    const gemini = makeProvider('gemini', '{"final answer": "ok"}');

    await makeOrchestrator([nvidia.provider, gemini.provider], { metrics }).run('What is the total?', manifest);

    const computed = metrics.getMetrics();
    expect(computed.total).toBe(2);
    expect(computed.success).toBe(1);
    expect(computed.providerFailed).toBe(1);
  });

  it('12. stop() aborts running attempts and releases their sessions', async () => {
    const nvidia = makeProvider('nvidia');
    let started: () => void = () => {};
    const running = new Promise<void>(resolve => {
      started = resolve;
    });
    nvidia.invoke.mockImplementation(
      (_prompt, signal) =>
        new Promise(resolve => {
          signal?.addEventListener('abort', () => resolve(null), { once: true });
          started();
        })
    );
    const orchestrator = makeOrchestrator([nvidia.provider]);

    const pending = orchestrator.run('What is the total?', manifest, 'req-5');
    await running;
    await orchestrator.stop();
    const result = await pending;

    expect(nvidia.invoke.mock.calls[0][1]?.aborted).toBe(true);
    expect(result.success).toBe(false);
    expect(sandbox.released).toContain('req-5:nvidia');
  });
});

describe('toResponseBody', () => {
  it('1. renames fields and drops attempt details', () => {
    const result: AnalysisResult = {
      success: true,
      finalAnswer: { total: 3 },
      apiUsed: 'gemini',
      iterations: 2,
      error: null,
      attempts: [{ provider: 'gemini', status: 'success', iterations: 2, durationMs: 5 }],
    };

    expect(toResponseBody(result)).toEqual({
      success: true,
      final_answer: { total: 3 },
      api_used: 'gemini',
      iterations: 2,
      error: null,
    });
  });
});
