import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { AppConfig } from '../config/configuration';
import { createSession, Session } from './session';

export type SessionMutator<T> = (session: Session) => T | Promise<T>;

/**
 * In-memory quiz progress, one session per user.
 *
 * Every operation for a user runs inside that user's lock: calls queue up in
 * order behind a per-user promise chain, while different users proceed
 * independently. Callers only ever see copies.
 */
const MAX_SWEEP_INTERVAL_MS = 60 * 1000;

@Injectable()
export class SessionStoreService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(SessionStoreService.name);
  private readonly sessions = new Map<string, Session>();
  private readonly locks = new Map<string, Promise<void>>();
  private readonly ttlMs: number;
  private readonly sweepIntervalMs: number;
  private lastSweep = Date.now();
  private sweepTimer?: NodeJS.Timeout;

  constructor(config: ConfigService<AppConfig, true>) {
    this.ttlMs = config.get('SESSION_TTL_MINUTES', { infer: true }) * 60 * 1000;
    this.sweepIntervalMs = Math.min(this.ttlMs, MAX_SWEEP_INTERVAL_MS);
  }

  onModuleInit() {
    if (this.ttlMs > 0) {
      this.sweepTimer = setInterval(() => this.sweep(), this.sweepIntervalMs);
      this.sweepTimer.unref();
    }
  }

  onModuleDestroy() {
    clearInterval(this.sweepTimer);
    this.sweepTimer = undefined;
  }

  get size(): number {
    return this.sessions.size;
  }

  getOrCreate(userId: string): Promise<Session> {
    return this.withLock(userId, () => {
      const session = this.load(userId);
      this.sessions.set(userId, session);
      return { ...session };
    });
  }

  /**
   * Runs `mutator` against a draft of the user's session (created as `NEW`
   * when absent) and commits the draft once it returns. A draft left in
   * `COMPLETED` is removed instead of stored. Nothing is committed when the
   * mutator throws.
   */
  update<T>(userId: string, mutator: SessionMutator<T>): Promise<T> {
    return this.withLock(userId, async () => {
      this.sweepIfDue();
      const draft = { ...this.load(userId) };
      const result = await mutator(draft);

      if (draft.state === 'COMPLETED') {
        this.sessions.delete(userId);
        this.logger.log(`🏁 Session for ${userId} completed and removed`);
      } else {
        draft.updatedAt = Date.now();
        this.sessions.set(userId, draft);
      }
      return result;
    });
  }

  delete(userId: string): Promise<boolean> {
    return this.withLock(userId, () => this.sessions.delete(userId));
  }

  /** Current session without creating one. */
  peek(userId: string): Session | undefined {
    const session = this.fresh(userId);
    return session ? { ...session } : undefined;
  }

  /** Drops every session idle for longer than the TTL; returns how many. */
  sweep(): number {
    this.lastSweep = Date.now();
    if (this.ttlMs <= 0) return 0;

    let removed = 0;
    for (const [userId, session] of this.sessions) {
      if (this.lastSweep - session.updatedAt > this.ttlMs) {
        this.sessions.delete(userId);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger.log(`🧹 Removed ${removed} idle sessions (active: ${this.sessions.size})`);
    }
    return removed;
  }

  private sweepIfDue(): void {
    if (this.ttlMs > 0 && Date.now() - this.lastSweep >= this.sweepIntervalMs) {
      this.sweep();
    }
  }

  private load(userId: string): Session {
    return this.fresh(userId) ?? createSession(userId, Date.now());
  }

  private fresh(userId: string): Session | undefined {
    const session = this.sessions.get(userId);
    if (!session) return undefined;

    if (this.ttlMs > 0 && Date.now() - session.updatedAt > this.ttlMs) {
      this.sessions.delete(userId);
      this.logger.log(`⌛ Session for ${userId} expired`);
      return undefined;
    }
    return session;
  }

  private async withLock<T>(userId: string, task: () => T | Promise<T>): Promise<T> {
    const previous = this.locks.get(userId) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.locks.set(userId, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.locks.get(userId) === tail) {
        this.locks.delete(userId);
      }
    }
  }
}
