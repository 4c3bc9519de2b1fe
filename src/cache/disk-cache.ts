import * as fs from 'fs/promises';
import * as path from 'path';
import { createHash } from 'crypto';
import pino from 'pino';
import writeFileAtomic from 'write-file-atomic';
import { getErrorMessage } from '../errors.js';

export interface ResultCache {
  get(key: string): Promise<string | undefined>;
  set(key: string, value: string, ttlMs: number): Promise<boolean>;
}

interface CacheEntry {
  value: string;
  expiresAt: number; // epoch ms
}

function isCacheEntry(value: unknown): value is CacheEntry {
  return (
    typeof value === 'object' &&
    value !== null &&
    'value' in value &&
    typeof value.value === 'string' &&
    'expiresAt' in value &&
    typeof value.expiresAt === 'number'
  );
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * File-per-entry cache with per-entry expiry.
 *
 * Entries are replaced with write-file-atomic. Read and write failures are
 * logged and reported as misses.
 */
export class DiskCache implements ResultCache {
  private dir: string;
  private log: pino.Logger;
  private now: () => number;

  constructor(dir: string, options: { logger?: pino.Logger; now?: () => number } = {}) {
    this.dir = path.resolve(dir);
    this.log = options.logger ?? pino({ level: 'silent' });
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<string | undefined> {
    const file = this.fileFor(key);
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) {
        this.log.warn({ key, err: getErrorMessage(error) }, 'Cache read failed');
      }
      return undefined;
    }

    let entry: unknown;
    try {
      entry = JSON.parse(raw);
    } catch (error) {
      this.log.warn({ key, err: getErrorMessage(error) }, 'Discarding corrupt cache entry');
      await this.evict(file);
      return undefined;
    }

    if (!isCacheEntry(entry)) {
      await this.evict(file);
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      await this.evict(file);
      return undefined;
    }
    return entry.value;
  }

  async set(key: string, value: string, ttlMs: number): Promise<boolean> {
    const entry: CacheEntry = { value, expiresAt: this.now() + ttlMs };
    try {
      await fs.mkdir(this.dir, { recursive: true });
      await writeFileAtomic(this.fileFor(key), JSON.stringify(entry), { encoding: 'utf-8' });
      return true;
    } catch (error) {
      this.log.warn({ key, err: getErrorMessage(error) }, 'Cache write failed');
      return false;
    }
  }

  private fileFor(key: string): string {
    // Keys carry ':' separators; hash them into a portable file name
    const name = createHash('sha256').update(key).digest('hex');
    return path.join(this.dir, `${name}.json`);
  }

  private async evict(file: string): Promise<void> {
    try {
      await fs.rm(file, { force: true });
    } catch (error) {
      this.log.warn({ file, err: getErrorMessage(error) }, 'Cache eviction failed');
    }
  }
}
