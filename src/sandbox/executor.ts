import pino from 'pino';
import { SandboxSession } from './session.js';
import type { ScriptRunner } from './session.js';
import type { SandboxSettings } from '../config.js';

/**
 * Hands out sandbox sessions to the orchestrator, one per attempt.
 */
export interface SandboxProvider {
  openSession(id: string): ScriptRunner;
  releaseSession(id: string): Promise<void>;
}

/**
 * SandboxExecutor tracks every open session by id so that shutdown can tear
 * all of them down. Sessions are never shared: opening an id that is already
 * open returns the same session, a released id gets a fresh one.
 */
export class SandboxExecutor implements SandboxProvider {
  private settings: SandboxSettings;
  private log: pino.Logger;
  private sessions = new Map<string, SandboxSession>();

  constructor(settings: SandboxSettings, logger?: pino.Logger) {
    this.settings = settings;
    this.log = (logger ?? pino({ level: 'silent' })).child({ component: 'sandbox' });
  }

  get openSessions(): number {
    return this.sessions.size;
  }

  openSession(id: string): SandboxSession {
    const existing = this.sessions.get(id);
    if (existing) {
      return existing;
    }
    const session = new SandboxSession(id, {
      image: this.settings.image,
      socketPath: this.settings.socketPath,
      networkMode: this.settings.networkMode,
      memoryMB: this.settings.memoryMB,
      cpuCount: this.settings.cpuCount,
      execTimeoutMs: this.settings.execTimeoutMs,
      installTimeoutMs: this.settings.installTimeoutMs,
      logger: this.log,
    });
    this.sessions.set(id, session);
    this.log.debug({ sessionId: id }, 'Session opened');
    return session;
  }

  async releaseSession(id: string): Promise<void> {
    const session = this.sessions.get(id);
    if (!session) {
      return;
    }
    this.sessions.delete(id);
    await session.close();
  }

  async closeAll(): Promise<void> {
    const sessions = [...this.sessions.values()];
    this.sessions.clear();
    if (sessions.length > 0) {
      this.log.info({ count: sessions.length }, 'Closing all sandbox sessions');
    }
    await Promise.all(sessions.map(session => session.close()));
  }
}
