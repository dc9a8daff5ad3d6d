/**
 * Session Manager - per-caller calculators with TTL cleanup
 * Each session owns its own Variable Store, so independent callers never
 * see each other's variables. Handlers (and their lookup caches) are shared.
 */

import { type AppConfig, DEFAULT_CONFIG } from "../config.ts";
import { Calculator, type LineResult } from "./calculator.ts";
import { buildHandlers, type FetchLike, type Handler } from "./handlers/index.ts";

export interface CalcSession {
  id: string;
  created_at: number;
  updated_at: number;
  calculator: Calculator;
  lines_processed: number;
}

interface SessionManagerConfig {
  ttl_ms: number; // Time-to-live for idle sessions
  cleanup_interval_ms: number;
  max_sessions: number;
}

const DEFAULT_SESSION_CONFIG: SessionManagerConfig = {
  ttl_ms: 30 * 60 * 1000, // 30 minutes
  cleanup_interval_ms: 5 * 60 * 1000, // 5 minutes
  max_sessions: 100,
};

class SessionManagerImpl {
  private sessions: Map<string, CalcSession> = new Map();
  private config: SessionManagerConfig;
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;
  private handlers: readonly Handler[] | null = null;
  private handlerFactory: () => readonly Handler[];

  constructor(
    config: Partial<SessionManagerConfig> = {},
    handlerFactory: () => readonly Handler[] = () => buildHandlers(DEFAULT_CONFIG),
  ) {
    this.config = { ...DEFAULT_SESSION_CONFIG, ...config };
    this.handlerFactory = handlerFactory;
    this.startCleanup();
  }

  /**
   * Apply app configuration. Drops existing sessions, since their handler
   * list no longer matches.
   */
  configure(appConfig: AppConfig, options: { fetch?: FetchLike } = {}): void {
    this.clearAll();
    this.config = {
      ...this.config,
      ttl_ms: appConfig.sessionTtlMs,
      max_sessions: appConfig.maxSessions,
    };
    this.handlers = null;
    this.handlerFactory = () => buildHandlers(appConfig, options);
  }

  private startCleanup(): void {
    if (this.cleanupTimer) return;
    this.cleanupTimer = setInterval(() => {
      this.cleanup();
    }, this.config.cleanup_interval_ms);
    // Never keep the process alive just for cleanup
    this.cleanupTimer.unref();
  }

  /** Drop sessions idle for longer than the TTL; returns how many were dropped */
  cleanup(now: number = Date.now()): number {
    const expired: string[] = [];

    for (const [id, session] of this.sessions) {
      if (now - session.updated_at > this.config.ttl_ms) {
        expired.push(id);
      }
    }

    for (const id of expired) {
      this.sessions.delete(id);
    }
    return expired.length;
  }

  private getHandlers(): readonly Handler[] {
    if (!this.handlers) {
      this.handlers = this.handlerFactory();
    }
    return this.handlers;
  }

  getOrCreate(sessionId: string): CalcSession {
    let session = this.sessions.get(sessionId);

    if (!session) {
      // Enforce max sessions limit
      if (this.sessions.size >= this.config.max_sessions) {
        // Remove oldest session
        let oldest: CalcSession | null = null;
        for (const candidate of this.sessions.values()) {
          if (!oldest || candidate.updated_at < oldest.updated_at) {
            oldest = candidate;
          }
        }
        if (oldest) this.sessions.delete(oldest.id);
      }

      const now = Date.now();
      session = {
        id: sessionId,
        created_at: now,
        updated_at: now,
        calculator: new Calculator(this.getHandlers()),
        lines_processed: 0,
      };
      this.sessions.set(sessionId, session);
    }

    session.updated_at = Date.now();
    return session;
  }

  get(sessionId: string): CalcSession | undefined {
    const session = this.sessions.get(sessionId);
    if (session) {
      session.updated_at = Date.now(); // Touch on access
    }
    return session;
  }

  /** Run a batch in a session, creating the session on first use */
  async calculate(sessionId: string, lines: readonly string[]): Promise<LineResult[]> {
    const session = this.getOrCreate(sessionId);
    const results = await session.calculator.trace(lines);
    session.lines_processed += lines.length;
    session.updated_at = Date.now();
    return results;
  }

  list(): { id: string; lines_processed: number; variables: number; age_ms: number }[] {
    const now = Date.now();
    return Array.from(this.sessions.values()).map((s) => ({
      id: s.id,
      lines_processed: s.lines_processed,
      variables: s.calculator.store.entries("user").length,
      age_ms: now - s.created_at,
    }));
  }

  clear(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  clearAll(): number {
    const count = this.sessions.size;
    this.sessions.clear();
    return count;
  }

  destroy(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    this.sessions.clear();
  }
}

// Export class for testing
export { SessionManagerImpl };

// Singleton instance
export const SessionManager = new SessionManagerImpl();
