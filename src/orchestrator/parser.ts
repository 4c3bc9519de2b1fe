import type {
  CodeResponse,
  ContinuationResponse,
  FinalAnswerResponse,
  ParsedResponse,
} from '../types.js';

/**
 * One classification strategy. Returns null when it does not apply; never throws.
 */
export type ParseTier = (text: string, raw: string) => ParsedResponse | null;

const FINAL_ANSWER_KEY = 'final answer';

// Permissive patterns for replies whose JSON is broken (bad quoting, commentary around it).
// String bodies may hold escaped quotes; captures are unescaped afterwards.
const FINAL_ANSWER_PATTERN = /\{[^}]*"final answer"\s*:\s*"((?:[^"\\]|\\.)+)"[^}]*\}/;
const CODE_PATTERN = /\{[^}]*"code"\s*:\s*"((?:[^"\\]|\\.)+)"[^}]*\}/;
const ANALYSIS_PATTERN = /\{[^}]*"analysis"\s*:\s*"((?:[^"\\]|\\.)+)"[^}]*\}/;

const OPENING_FENCE = /^```[\w+-]*[ \t]*\r?\n?/;
const CLOSING_FENCE = /\r?\n?```$/;

export function stripCodeFence(text: string): string {
  let t = text.trim();
  if (t.startsWith('```')) {
    t = t.replace(OPENING_FENCE, '');
  }
  if (t.endsWith('```')) {
    t = t.replace(CLOSING_FENCE, '');
  }
  return t.trim();
}

function stringifyValue(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  return JSON.stringify(value) ?? String(value);
}

function normalizeCodeBlocks(code: unknown): string[] {
  const blocks = Array.isArray(code) ? code.map(stringifyValue) : [stringifyValue(code)];
  return blocks.filter(block => block.trim().length > 0);
}

/**
 * Decode a captured JSON string body (handles \n, \t, \\); fall back to the
 * capture itself when it is not valid JSON string content.
 */
function unescapeCapture(captured: string): string {
  try {
    const decoded: unknown = JSON.parse(`"${captured}"`);
    return typeof decoded === 'string' ? decoded : captured;
  } catch {
    return captured;
  }
}

function finalAnswer(value: unknown, raw: string): FinalAnswerResponse {
  return {
    kind: 'final_answer',
    content: stringifyValue(value),
    value,
    codeBlocks: [],
    analysis: null,
    raw,
    requiresFollowup: false,
  };
}

function codeResponse(blocks: [string, ...string[]], analysis: string | null, raw: string): CodeResponse {
  return {
    kind: 'code',
    content: blocks.join('\n\n'),
    codeBlocks: blocks,
    analysis,
    raw,
    requiresFollowup: false,
  };
}

function continuation(content: string, raw: string): ContinuationResponse {
  return {
    kind: 'continuation',
    content,
    codeBlocks: [],
    analysis: null,
    raw,
    requiresFollowup: true,
  };
}

export const emptyTier: ParseTier = (text, raw) => (text.length === 0 ? continuation('', raw) : null);

/**
 * Strict tier: the whole reply (minus an enclosing code fence) is a JSON object
 * carrying either "final answer" or "code".
 */
export const structuredTier: ParseTier = (text, raw) => {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(text));
  } catch {
    return null;
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return null;
  }

  if (FINAL_ANSWER_KEY in parsed) {
    return finalAnswer(parsed[FINAL_ANSWER_KEY], raw);
  }

  if ('code' in parsed) {
    const [first, ...rest] = normalizeCodeBlocks(parsed.code);
    if (first === undefined) {
      return null;
    }
    const analysis = 'analysis' in parsed && parsed.analysis != null ? stringifyValue(parsed.analysis) : null;
    return codeResponse([first, ...rest], analysis, raw);
  }

  return null;
};

/**
 * Fallback tier: regex extraction of an embedded {"final answer": "..."} or
 * {"code": "..."} fragment from free text.
 */
export const patternTier: ParseTier = (text, raw) => {
  const answerMatch = FINAL_ANSWER_PATTERN.exec(text);
  if (answerMatch) {
    return finalAnswer(unescapeCapture(answerMatch[1]), raw);
  }

  const codeMatch = CODE_PATTERN.exec(text);
  const code = codeMatch ? unescapeCapture(codeMatch[1]) : '';
  if (code.trim()) {
    const analysisMatch = ANALYSIS_PATTERN.exec(text);
    return codeResponse(
      [code],
      analysisMatch ? unescapeCapture(analysisMatch[1]) : null,
      raw
    );
  }

  return null;
};

export const DEFAULT_TIERS: readonly ParseTier[] = [emptyTier, structuredTier, patternTier];

/**
 * Classify a raw model reply. Tiers run in order and the first match wins;
 * anything unmatched is a continuation that asks the model to try again.
 */
export function parseResponse(raw: string | null | undefined, tiers: readonly ParseTier[] = DEFAULT_TIERS): ParsedResponse {
  const original = raw ?? '';
  const text = original.trim();
  for (const tier of tiers) {
    const result = tier(text, original);
    if (result) {
      return result;
    }
  }
  return continuation(text, original);
}
