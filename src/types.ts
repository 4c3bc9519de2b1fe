export type ProviderKind = 'openai-compatible' | 'gemini' | 'anthropic';

/**
 * Immutable per-provider settings, built once from configuration.
 */
export interface ProviderConfig {
  readonly name: string;
  readonly kind: ProviderKind;
  readonly model: string;
  readonly apiKey?: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly backoffBaseMs: number;
  readonly backoffCapMs: number;
  readonly maxTokens: number;
  readonly temperature: number;
}

export interface ContainerConfig {
  image: string;
  workspaceDir: string;
  mountPath: string;
  networkMode?: string;
  memoryMB?: number;
  cpuCount?: number;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * Uploaded file name -> absolute path on the host.
 */
export type FileManifest = Readonly<Record<string, string>>;

export interface ExecutionResult {
  success: boolean;
  stdout: string;
  stderr: string;
  exitCode: number | null;  // null when the script never finished
}

export interface FinalAnswerResponse {
  kind: 'final_answer';
  content: string;
  value: unknown;           // the answer as the model sent it (may be structured)
  codeBlocks: [];
  analysis: null;
  raw: string;
  requiresFollowup: false;
}

export interface CodeResponse {
  kind: 'code';
  content: string;
  codeBlocks: [string, ...string[]];
  analysis: string | null;
  raw: string;
  requiresFollowup: false;
}

export interface ContinuationResponse {
  kind: 'continuation';
  content: string;
  codeBlocks: [];
  analysis: null;
  raw: string;
  requiresFollowup: true;
}

export type ParsedResponse = FinalAnswerResponse | CodeResponse | ContinuationResponse;

/**
 * One round of the feedback loop, kept only to build the next prompt.
 */
export interface IterationRecord {
  iteration: number;
  rawOutput: string;
  execution?: ExecutionResult;
}

export type AttemptStatus =
  | 'success'
  | 'provider_failed'
  | 'deadline_exceeded'
  | 'iteration_limit'
  | 'failed';

export interface AttemptSummary {
  provider: string;
  status: AttemptStatus;
  iterations: number;
  durationMs: number;
  error?: string;
}

/**
 * Outcome of a full orchestrated run across providers.
 */
export interface AnalysisResult {
  success: boolean;
  finalAnswer: unknown;
  apiUsed: string | null;
  iterations: number | null;
  error: string | null;
  attempts: AttemptSummary[];
}

/**
 * Result body in the shape the front door returns to clients.
 */
export interface AnalysisResponseBody {
  success: boolean;
  final_answer: unknown;
  api_used: string | null;
  iterations: number | null;
  error: string | null;
}

export interface UploadedFile {
  filename: string;
  content: Buffer;
}
