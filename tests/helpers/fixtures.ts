// Shared test fixtures: temp datastores, in-memory request channel, process wiring

import { mkdtempSync, rmSync, writeFileSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { RequestChannel } from '@/domain/identity/types.js';
import { DatabaseConnection, SqliteCredentialWriteLock } from '@/infrastructure/database/sqlite/connection.js';
import { SqliteSessionStore } from '@/infrastructure/database/sqlite/SessionStore.js';
import { CredentialRegistry } from '@/infrastructure/credentials/CredentialRegistry.js';
import { PasswordVerifier, type PasswordVerifierConfig } from '@/application/auth/PasswordVerifier.js';
import { SessionPropagator } from '@/application/auth/SessionPropagator.js';
import { AuthService } from '@/application/auth/AuthService.js';

export const DAY_MS = 24 * 60 * 60 * 1000;
export const TEST_TTL_MS = 30 * DAY_MS;

// Lowest argon2 costs the library accepts
export const FAST_ARGON2: Omit<PasswordVerifierConfig, 'allowPlaintext'> = {
  memoryCost: 1024,
  timeCost: 2,
  parallelism: 1,
};

export function makeTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'shared-auth-test-'));
}

export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

export interface CredentialFixture {
  name?: string;
  email?: string;
  password: string;
  role?: string;
  subscription_tier?: string;
  subscription_status?: string;
  created_at?: string;
}

export function writeCredentialFile(path: string, usernames: Record<string, CredentialFixture>): void {
  writeFileSync(path, JSON.stringify({ credentials: { usernames } }, null, 2));
}

export function readCredentialFile(path: string): { credentials: { usernames: Record<string, CredentialFixture> } } {
  return JSON.parse(readFileSync(path, 'utf-8'));
}

/**
 * One browser: a cookie jar shared by every front end, plus the current URL's query
 */
export class InMemoryChannel implements RequestChannel {
  readonly query = new Map<string, string>();
  readonly stripped: string[] = [];
  readonly cookieWrites: Array<{ name: string; value: string; maxAgeMs: number }> = [];
  readonly cleared: string[] = [];

  constructor(readonly cookies: Map<string, string> = new Map()) {}

  getQueryParam(name: string): string | undefined {
    return this.query.get(name);
  }

  stripQueryParam(name: string): void {
    this.query.delete(name);
    this.stripped.push(name);
  }

  getCookie(name: string): string | undefined {
    return this.cookies.get(name);
  }

  setCookie(name: string, value: string, maxAgeMs: number): void {
    this.cookies.set(name, value);
    this.cookieWrites.push({ name, value, maxAgeMs });
  }

  clearCookie(name: string): void {
    this.cookies.delete(name);
    this.cleared.push(name);
  }
}

/**
 * Everything one front-end process holds. Two of these on the same directory
 * stand in for two processes sharing the stores.
 */
export interface TestProcess {
  connection: DatabaseConnection;
  sessions: SqliteSessionStore;
  credentials: CredentialRegistry;
  passwords: PasswordVerifier;
  propagator: SessionPropagator;
  authService: AuthService;
  close(): void;
}

export function startProcess(
  dir: string,
  options: { allowPlaintext?: boolean; ttlMs?: number } = {}
): TestProcess {
  const ttlMs = options.ttlMs ?? TEST_TTL_MS;
  const connection = new DatabaseConnection({ path: join(dir, 'auth_sessions.db'), busyTimeoutMs: 2000 });
  const sessions = new SqliteSessionStore(connection, { ttlMs });
  const credentials = new CredentialRegistry(
    { path: join(dir, 'credentials.json') },
    new SqliteCredentialWriteLock(connection)
  );
  credentials.init();
  const passwords = new PasswordVerifier({ ...FAST_ARGON2, allowPlaintext: options.allowPlaintext ?? true });
  const propagator = new SessionPropagator({ cookieName: 'sso_session_id', linkParam: 'sessionId', ttlMs });
  const authService = new AuthService(credentials, sessions, passwords, propagator, { sessionTtlMs: ttlMs });

  return {
    connection,
    sessions,
    credentials,
    passwords,
    propagator,
    authService,
    close: () => connection.close(),
  };
}
