import { v4 as uuidv4 } from 'uuid';
import type { Logger } from 'pino';
import { SessionNotFoundError } from '../types/errors.js';
import { StorySession, type StorySessionOptions } from './storySession.js';

/** Builds the per-session parts: a fresh backend and the shared tools. */
export type StorySessionFactory = (
  sessionId: string,
  log: Logger,
) => Omit<StorySessionOptions, 'sessionId' | 'log'>;

export class StorySessionStore {
  private readonly sessions = new Map<string, StorySession>();

  constructor(
    private readonly factory: StorySessionFactory,
    private readonly log: Logger,
  ) {}

  create(sessionId: string = uuidv4()): StorySession {
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;

    const log = this.log.child({ sessionId });
    const session = new StorySession({ ...this.factory(sessionId, log), sessionId, log });
    this.sessions.set(sessionId, session);
    log.info('[StorySessionStore] session created');
    return session;
  }

  get(sessionId: string): StorySession {
    const session = this.sessions.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  destroy(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    session.destroy();
    this.sessions.delete(sessionId);
    this.log.info({ sessionId }, '[StorySessionStore] session destroyed');
    return true;
  }

  get size(): number {
    return this.sessions.size;
  }
}
