import type { ExecutionResult, IterationRecord } from '../types.js';

export const MAX_OUTPUT_CHARS = 4000;

export const SYSTEM_PROMPT = `You are a data analyst agent. You answer the user's question by writing
Python 3.11 scripts that run in a sandbox, reading the results, and iterating until
you can answer.

Environment:
- Your script runs as script.py in /workspace, next to every uploaded file.
- Third-party packages you import are installed before the script runs.
- Network access is available for fetching public data (use requests or httpx).
- Files may be CSV, JSON, Parquet, Excel, SQLite databases, images or text.

Reply protocol. Reply with exactly ONE JSON object and nothing else:
1. To run code:   {"code": "<python script>", "analysis": "<progress so far>"}
2. To finish:     {"final answer": <the answer in the format the question asks for>}

Rules:
- Write complete, runnable scripts. Print everything you need to see.
- Each script runs after the previous ones; send only the next incremental step.
- Do not wrap the JSON in commentary. Answer as early as the evidence allows.`;

const CONTINUE_INSTRUCTION = 'Please provide the final answer or executable code.';

const NEXT_STEP_INSTRUCTION = `Now, based on this history, please either:
1. Provide the final answer in JSON format: {"final answer": ...}
2. OR, if more work is needed, provide only the next incremental code block:
   {"code": <code to be executed>, "analysis": <brief description of the progress made>}

Prefer one efficient script over many small ones, and give the final answer as soon
as the results are sufficient.`;

/**
 * First prompt of every attempt: protocol, question, file names.
 */
export function buildInitialPrompt(question: string, fileNames: readonly string[]): string {
  const files = fileNames.length > 0 ? fileNames.map(name => `- ${name}`).join('\n') : '(none)';
  return `${SYSTEM_PROMPT}\n\nQuestion: ${question}\n\nFiles available for context:\n${files}`;
}

/**
 * Keep the head and tail of long output with a marker noting how much was cut.
 */
export function truncateOutput(text: string, maxChars: number = MAX_OUTPUT_CHARS): string {
  if (text.length <= maxChars) {
    return text;
  }
  const half = Math.floor(maxChars / 2);
  const omitted = text.length - half * 2;
  return `${text.slice(0, half)}\n... [${omitted} characters truncated] ...\n${text.slice(-half)}`;
}

export function formatExecutionResult(result: ExecutionResult): string {
  return JSON.stringify(
    {
      success: result.success,
      exit_code: result.exitCode,
      stdout: truncateOutput(result.stdout),
      stderr: truncateOutput(result.stderr),
    },
    null,
    2
  );
}

export function formatIteration(record: IterationRecord): string {
  const lines = [`Iteration ${record.iteration}`, `Model output:\n${record.rawOutput}`];
  if (record.execution) {
    lines.push(`Execution Results:\n${formatExecutionResult(record.execution)}`);
  }
  return lines.join('\n\n');
}

/**
 * Prompt sent after code ran: the original prompt, every iteration so far, and
 * the instruction to answer or send the next step.
 */
export function buildFeedbackPrompt(originalPrompt: string, history: readonly IterationRecord[]): string {
  return [
    `Original Question:\n${originalPrompt}`,
    `Here is the full history of attempts so far:\n${history.map(formatIteration).join('\n\n---\n\n')}`,
    NEXT_STEP_INSTRUCTION,
  ].join('\n\n');
}

/**
 * Prompt sent when the previous reply was neither an answer nor code.
 */
export function buildContinuationPrompt(originalPrompt: string, previousOutput: string): string {
  return `${originalPrompt}\n\nPrevious response:\n${previousOutput}\n\n${CONTINUE_INSTRUCTION}`;
}
