// Session Store - SQLite implementation
// Shared session table read and written by every front-end process

import { randomBytes } from 'crypto';
import { z } from 'zod';
import {
  activeSessionRowSchema,
  type ActiveSessionRow,
  type DatabaseConnection,
  type SqliteStatement,
} from './connection.js';
import type { SessionRecord, UserProfile } from '@/domain/user/types.js';
import { parseSubscriptionStatus, parseSubscriptionTier } from '@/domain/user/types.js';
import type { ISessionStore } from '@/domain/user/repository.js';
import { normalizeRole } from '@/domain/user/roles.js';
import { StoreUnavailableError } from '@/utils/errors.js';
import {
  sessionStoreLogger,
  authMetrics,
  AUTH_METRICS,
  redactSessionId,
} from '@/utils/auth-logger.js';

export interface SessionStoreOptions {
  ttlMs: number;
}

const SESSION_COLUMNS = `
  session_id, username, display_name, email, role,
  subscription_tier, subscription_status, created_at, last_accessed, expires_at
`;

const runResultSchema = z.object({ changes: z.number() });
const countRowSchema = z.object({ count: z.number() });

/**
 * 32 random bytes, URL-safe so the token can ride in a query string
 */
export function generateSessionId(): string {
  return randomBytes(32).toString('base64url');
}

export class SqliteSessionStore implements ISessionStore {
  private readonly insertStmt: SqliteStatement;
  private readonly selectStmt: SqliteStatement;
  private readonly deleteIfExpiredStmt: SqliteStatement;
  private readonly touchStmt: SqliteStatement;
  private readonly deleteStmt: SqliteStatement;
  private readonly deleteByUsernameStmt: SqliteStatement;
  private readonly sweepStmt: SqliteStatement;
  private readonly countActiveStmt: SqliteStatement;

  constructor(
    private db: DatabaseConnection,
    private options: SessionStoreOptions
  ) {
    const sql = db.getDatabase();

    this.insertStmt = sql.prepare(`
      INSERT INTO active_sessions (${SESSION_COLUMNS})
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `);
    this.selectStmt = sql.prepare(
      `SELECT ${SESSION_COLUMNS} FROM active_sessions WHERE session_id = ?`
    );
    // Conditional so a row refreshed by another process in between is left alone
    this.deleteIfExpiredStmt = sql.prepare(
      'DELETE FROM active_sessions WHERE session_id = ? AND expires_at <= ?'
    );
    this.touchStmt = sql.prepare(
      'UPDATE active_sessions SET last_accessed = ? WHERE session_id = ? AND expires_at > ?'
    );
    this.deleteStmt = sql.prepare(
      'DELETE FROM active_sessions WHERE session_id = ?'
    );
    this.deleteByUsernameStmt = sql.prepare(
      'DELETE FROM active_sessions WHERE username = ?'
    );
    this.sweepStmt = sql.prepare(
      'DELETE FROM active_sessions WHERE expires_at <= ?'
    );
    this.countActiveStmt = sql.prepare(
      'SELECT COUNT(*) AS count FROM active_sessions WHERE expires_at > ?'
    );
  }

  /**
   * Mint a new session carrying a snapshot of the user's profile
   */
  create(username: string, profile: UserProfile): SessionRecord {
    const now = Date.now();
    const record: SessionRecord = {
      ...profile,
      username,
      sessionId: generateSessionId(),
      createdAt: new Date(now),
      lastAccessedAt: new Date(now),
      expiresAt: new Date(now + this.options.ttlMs),
    };

    this.guard('create', () => this.insertStmt.run(...this.sessionToParams(record)));

    authMetrics.increment(AUTH_METRICS.SESSION_CREATED);
    sessionStoreLogger.debug('Session created', {
      sessionId: redactSessionId(record.sessionId),
      username,
      expiresAt: record.expiresAt.toISOString(),
    });

    return record;
  }

  /**
   * Find a valid session. An expired row is deleted on the way out.
   */
  get(sessionId: string): SessionRecord | null {
    const row = this.guard('get', () => {
      const found: unknown = this.selectStmt.get(sessionId);
      return found === undefined || found === null ? null : activeSessionRowSchema.parse(found);
    });
    if (!row) return null;

    const now = Date.now();
    if (row.expires_at <= now) {
      this.guard('get', () => this.deleteIfExpiredStmt.run(sessionId, now));
      authMetrics.increment(AUTH_METRICS.SESSION_EXPIRED);
      sessionStoreLogger.info('Expired session removed on lookup', {
        sessionId: redactSessionId(sessionId),
        username: row.username,
      });
      return null;
    }

    return this.rowToSession(row);
  }

  /**
   * Refresh last_accessed. Best effort: a failure is logged and reported as false.
   */
  touch(sessionId: string): boolean {
    try {
      this.db.assertOpen();
      const now = Date.now();
      return changesOf(this.touchStmt.run(now, sessionId, now)) > 0;
    } catch (error) {
      sessionStoreLogger.warn('Failed to refresh session access time', {
        sessionId: redactSessionId(sessionId),
        error: String(error),
      });
      return false;
    }
  }

  delete(sessionId: string): boolean {
    const changes = this.guard('delete', () => changesOf(this.deleteStmt.run(sessionId)));
    if (changes > 0) {
      authMetrics.increment(AUTH_METRICS.SESSION_DELETED);
    }
    return changes > 0;
  }

  /**
   * Delete every session a user holds, across all front ends
   */
  deleteByUsername(username: string): number {
    const changes = this.guard('deleteByUsername', () => changesOf(this.deleteByUsernameStmt.run(username)));
    authMetrics.increment(AUTH_METRICS.SESSION_DELETED, changes);
    return changes;
  }

  /**
   * Delete all expired sessions. Safe to run from several processes at once.
   */
  sweepExpired(): number {
    return this.guard('sweepExpired', () => changesOf(this.sweepStmt.run(Date.now())));
  }

  countActive(): number {
    return this.guard('countActive', () => {
      const row: unknown = this.countActiveStmt.get(Date.now());
      return row === undefined || row === null ? 0 : countRowSchema.parse(row).count;
    });
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      this.db.assertOpen();
      return fn();
    } catch (error) {
      sessionStoreLogger.error('Session datastore operation failed', {
        operation,
        path: this.db.getPath(),
        error: String(error),
      });
      throw new StoreUnavailableError(`Session store ${operation} failed`, {
        operation,
        cause: String(error),
      });
    }
  }

  // Positional parameters in SESSION_COLUMNS order
  private sessionToParams(session: SessionRecord): Array<string | number> {
    return [
      session.sessionId,
      session.username,
      session.displayName,
      session.email,
      session.role,
      session.subscriptionTier,
      session.subscriptionStatus,
      session.createdAt.getTime(),
      session.lastAccessedAt.getTime(),
      session.expiresAt.getTime(),
    ];
  }

  private rowToSession(row: ActiveSessionRow): SessionRecord {
    return {
      sessionId: row.session_id,
      username: row.username,
      displayName: row.display_name ?? row.username,
      email: row.email ?? '',
      role: normalizeRole(row.role) ?? 'public',
      subscriptionTier: parseSubscriptionTier(row.subscription_tier),
      subscriptionStatus: parseSubscriptionStatus(row.subscription_status),
      createdAt: new Date(row.created_at),
      lastAccessedAt: new Date(row.last_accessed),
      expiresAt: new Date(row.expires_at),
    };
  }
}

function changesOf(result: unknown): number {
  return runResultSchema.parse(result).changes;
}
