import * as os from 'os';
import * as nodePath from 'path';
import * as fs from 'fs/promises';
import pino from 'pino';
import { ValidationError, getErrorMessage } from '../errors.js';
import { SCRIPT_FILE } from '../sandbox/session.js';
import type { FileManifest, UploadedFile } from '../types.js';

export const QUESTION_FILE = 'question.txt';
export const MISSING_QUESTION_MESSAGE = 'question.txt is required but missing';
export const DEFAULT_MAX_FILE_SIZE_BYTES = 50 * 1024 * 1024;

const UNSAFE_CHARS = /[<>:"|?*]/g;

export interface PreparedRequest {
  question: string;
  manifest: FileManifest;
  stagingDir: string;
  cleanup(): Promise<void>;
}

export interface PrepareOptions {
  maxFileSizeBytes?: number;  // soft limit, logged only
  logger?: pino.Logger;
}

/**
 * Reduce an uploaded name to a safe single path segment.
 *
 * @example sanitizeFilename('../data/sales?.csv') // 'sales_.csv'
 */
export function sanitizeFilename(name: string): string {
  const segments = name.split(/[\\/]/);
  const last = segments[segments.length - 1] ?? '';
  const cleaned = last.replace(UNSAFE_CHARS, '_').replace(/^[ .]+|[ .]+$/g, '');
  return cleaned || 'untitled';
}

/**
 * Split an upload into the question and a manifest of staged data files.
 * The caller owns the staging directory and must call cleanup().
 *
 * @throws ValidationError when question.txt is absent or blank, or a file
 * takes the name the sandbox reserves for generated scripts
 */
export async function prepareRequest(
  files: readonly UploadedFile[],
  options: PrepareOptions = {}
): Promise<PreparedRequest> {
  const log = options.logger ?? pino({ level: 'silent' });
  const maxFileSize = options.maxFileSizeBytes ?? DEFAULT_MAX_FILE_SIZE_BYTES;

  let question: string | null = null;
  const dataFiles = new Map<string, Buffer>();

  for (const file of files) {
    const filename = sanitizeFilename(file.filename);
    if (file.content.length > maxFileSize) {
      log.warn({ filename, bytes: file.content.length }, 'Uploaded file is very large');
    }
    if (filename === SCRIPT_FILE) {
      throw new ValidationError(`${SCRIPT_FILE} is a reserved file name`);
    }
    if (filename.toLowerCase() === QUESTION_FILE) {
      question = file.content.toString('utf-8').trim();
      log.info({ chars: question.length }, 'Question received');
    } else {
      dataFiles.set(filename, file.content);
    }
  }

  if (!question) {
    log.warn('Request missing question.txt');
    throw new ValidationError(MISSING_QUESTION_MESSAGE);
  }

  const stagingDir = await fs.mkdtemp(nodePath.join(os.tmpdir(), 'analyst-upload-'));
  const cleanup = async (): Promise<void> => {
    try {
      await fs.rm(stagingDir, { recursive: true, force: true });
    } catch (error) {
      log.warn({ stagingDir, err: getErrorMessage(error) }, 'Failed to remove staging directory');
    }
  };

  const manifest: Record<string, string> = {};
  try {
    for (const [filename, content] of dataFiles) {
      const target = nodePath.join(stagingDir, filename);
      await fs.writeFile(target, content);
      manifest[filename] = target;
    }
  } catch (error) {
    await cleanup();
    throw error;
  }

  log.info({ files: Object.keys(manifest) }, 'Request staged');
  return { question, manifest, stagingDir, cleanup };
}
