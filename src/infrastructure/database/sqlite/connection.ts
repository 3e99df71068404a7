// SQLite connection for the shared session datastore
// One file opened by every front-end process; WAL keeps readers and writers apart

import Database from 'libsql';
import { dirname } from 'path';
import { mkdirSync } from 'fs';
import { z } from 'zod';
import type { ICredentialWriteLock } from '@/domain/user/repository.js';
import { StoreUnavailableError } from '@/utils/errors.js';
import { sessionStoreLogger } from '@/utils/auth-logger.js';

export type SqliteDatabase = Database.Database;
export type SqliteStatement = Database.Statement;

// Row shape of the active_sessions table
export const activeSessionRowSchema = z.object({
  session_id: z.string(),
  username: z.string(),
  display_name: z.string().nullable(),
  email: z.string().nullable(),
  role: z.string(),
  subscription_tier: z.string(),
  subscription_status: z.string(),
  created_at: z.number(),      // epoch ms
  last_accessed: z.number(),   // epoch ms
  expires_at: z.number(),      // epoch ms
});

export type ActiveSessionRow = z.infer<typeof activeSessionRowSchema>;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS active_sessions (
    session_id TEXT PRIMARY KEY,
    username TEXT NOT NULL,
    display_name TEXT,
    email TEXT,
    role TEXT NOT NULL,
    subscription_tier TEXT NOT NULL DEFAULT 'free',
    subscription_status TEXT NOT NULL DEFAULT 'inactive',
    created_at INTEGER NOT NULL,
    last_accessed INTEGER NOT NULL,
    expires_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS idx_active_sessions_expires_at ON active_sessions (expires_at);
  CREATE INDEX IF NOT EXISTS idx_active_sessions_username ON active_sessions (username);
`;

// Database configuration
export interface DatabaseConfig {
  path: string;
  busyTimeoutMs?: number;   // How long a statement waits on another process's lock
}

export class DatabaseConnection {
  private db: SqliteDatabase;
  private closed = false;

  constructor(private config: DatabaseConfig) {
    this.db = DatabaseConnection.open(config);
    sessionStoreLogger.info('Session datastore ready', { path: config.path });
  }

  private static open(config: DatabaseConfig): SqliteDatabase {
    if (config.path !== ':memory:') {
      mkdirSync(dirname(config.path), { recursive: true });
    }

    try {
      const db = new Database(config.path, {});
      db.exec(`PRAGMA busy_timeout = ${Math.max(0, Math.floor(config.busyTimeoutMs ?? 5000))}`);
      if (config.path !== ':memory:') {
        db.exec('PRAGMA journal_mode = WAL');
      }
      db.exec('PRAGMA synchronous = NORMAL');
      db.exec(SCHEMA);
      return db;
    } catch (error) {
      sessionStoreLogger.error('Failed to open session datastore', {
        path: config.path,
        error: String(error),
      });
      throw new StoreUnavailableError('Session datastore could not be opened', {
        path: config.path,
        cause: String(error),
      });
    }
  }

  /**
   * Get the libsql handle directly
   */
  getDatabase(): SqliteDatabase {
    this.assertOpen();
    return this.db;
  }

  getPath(): string {
    return this.config.path;
  }

  /**
   * Statements prepared before close() must not run afterwards
   */
  assertOpen(): void {
    if (this.closed) {
      throw new StoreUnavailableError('Session datastore is closed', { path: this.config.path });
    }
  }

  close(): void {
    if (!this.closed) {
      this.closed = true;
      this.db.close();
    }
  }
}

/**
 * Serializes credential-file writes across processes by holding the
 * datastore's write lock (BEGIN IMMEDIATE) for the duration of `fn`.
 */
export class SqliteCredentialWriteLock implements ICredentialWriteLock {
  constructor(private connection: DatabaseConnection) {}

  withLock<T>(fn: () => T): T {
    try {
      const db = this.connection.getDatabase();
      db.exec('BEGIN IMMEDIATE');
      try {
        const result = fn();
        db.exec('COMMIT');
        return result;
      } catch (error) {
        this.rollback(db);
        throw error;
      }
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        throw error;
      }
      throw new StoreUnavailableError('Credential write lock could not be acquired', {
        cause: String(error),
      });
    }
  }

  private rollback(db: SqliteDatabase): void {
    try {
      db.exec('ROLLBACK');
    } catch (error) {
      sessionStoreLogger.error('Credential write lock rollback failed', { error: String(error) });
    }
  }
}
