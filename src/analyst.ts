import pino from 'pino';
import { ValidationError, getErrorMessage } from './errors.js';
import { prepareRequest } from './intake/uploads.js';
import type { PreparedRequest } from './intake/uploads.js';
import { toResponseBody } from './orchestrator/orchestrator.js';
import type { FeedbackOrchestrator } from './orchestrator/orchestrator.js';
import type { AnalysisResponseBody, UploadedFile } from './types.js';

export interface ErrorBody {
  success: false;
  error: string;
}

export interface AnalystResponse {
  statusCode: 200 | 400 | 500;
  body: AnalysisResponseBody | ErrorBody;
}

export interface AnalystServiceOptions {
  maxFileSizeBytes?: number;
  logger?: pino.Logger;
}

/**
 * Front door: uploads in, status code and result body out.
 * 400 when the request is invalid (the orchestrator is never called), 200 with
 * the orchestrator's body otherwise, 500 if anything unexpected throws.
 */
export class AnalystService {
  private orchestrator: Pick<FeedbackOrchestrator, 'run'>;
  private options: AnalystServiceOptions;
  private log: pino.Logger;

  constructor(orchestrator: Pick<FeedbackOrchestrator, 'run'>, options: AnalystServiceOptions = {}) {
    this.orchestrator = orchestrator;
    this.options = options;
    this.log = (options.logger ?? pino({ level: 'silent' })).child({ component: 'analyst' });
  }

  async handleRequest(files: readonly UploadedFile[], requestId?: string): Promise<AnalystResponse> {
    let prepared: PreparedRequest | undefined;
    try {
      prepared = await prepareRequest(files, {
        maxFileSizeBytes: this.options.maxFileSizeBytes,
        logger: this.log,
      });
      const result = await this.orchestrator.run(prepared.question, prepared.manifest, requestId);
      return { statusCode: 200, body: toResponseBody(result) };
    } catch (err) {
      if (err instanceof ValidationError) {
        return { statusCode: 400, body: { success: false, error: err.message } };
      }
      this.log.error({ err }, 'Request failed');
      return { statusCode: 500, body: { success: false, error: getErrorMessage(err) } };
    } finally {
      await prepared?.cleanup();
    }
  }
}
