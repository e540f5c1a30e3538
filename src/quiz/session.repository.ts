import { ConcurrentModificationError, SessionNotFoundError } from './quiz.errors';
import { QuizSession } from './session';

export const SESSION_REPOSITORY = Symbol('SESSION_REPOSITORY');

/**
 * Where quiz sessions live between requests. Implementations may be
 * remote, so every call is async.
 */
export interface SessionRepository {
  get(key: string): Promise<QuizSession | undefined>;
  /**
   * Stores `session` under `key`. With `expectedVersion`, the write only
   * succeeds if the stored session still has that version.
   */
  put(key: string, session: QuizSession, expectedVersion?: number): Promise<void>;
  delete(key: string): Promise<boolean>;
}

export interface InMemorySessionRepositoryOptions {
  /** Idle time after the last write before a session is dropped. */
  ttlMs: number;
  now?: () => number;
}

interface Entry {
  session: QuizSession;
  expiresAt: number;
}

export class InMemorySessionRepository implements SessionRepository {
  private readonly entries = new Map<string, Entry>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: InMemorySessionRepositoryOptions) {
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<QuizSession | undefined> {
    const entry = this.live(key);
    return entry ? structuredClone(entry.session) : undefined;
  }

  /**
   * Without `expectedVersion` the write replaces whatever is stored. Versions
   * keep rising per key across replacements, so a write based on the replaced
   * session can never match the new one.
   */
  async put(key: string, session: QuizSession, expectedVersion?: number): Promise<void> {
    const previous = this.entries.get(key);
    this.evictExpired();

    if (expectedVersion !== undefined) {
      const current = this.live(key);
      if (!current) throw new SessionNotFoundError(key);
      if (current.session.version !== expectedVersion) {
        throw new ConcurrentModificationError(key, expectedVersion, current.session.version);
      }
    }

    const stored = structuredClone(session);
    if (previous) stored.version = Math.max(stored.version, previous.session.version + 1);
    this.entries.set(key, { session: stored, expiresAt: this.now() + this.ttlMs });
  }

  async delete(key: string): Promise<boolean> {
    return this.live(key) !== undefined && this.entries.delete(key);
  }

  /** Number of unexpired sessions. */
  get size(): number {
    this.evictExpired();
    return this.entries.size;
  }

  private live(key: string): Entry | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private evictExpired(): void {
    const now = this.now();
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= now) this.entries.delete(key);
    }
  }
}
