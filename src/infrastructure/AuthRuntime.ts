// Auth Runtime - composition root for one front-end process
// Opens the shared session datastore and credential file and wires the services

import { DatabaseConnection, SqliteCredentialWriteLock } from './database/sqlite/connection.js';
import { SqliteSessionStore } from './database/sqlite/SessionStore.js';
import { SessionCleanupJob } from './database/sqlite/SessionCleanupJob.js';
import { CredentialRegistry } from './credentials/CredentialRegistry.js';
import { IdentityCache } from './cache/IdentityCache.js';
import { AuthService } from '@/application/auth/AuthService.js';
import { PasswordVerifier } from '@/application/auth/PasswordVerifier.js';
import { SessionPropagator } from '@/application/auth/SessionPropagator.js';
import { buildAppConfig, sessionTtlMs, type AppConfig } from '@/utils/config.js';
import { authLogger } from '@/utils/auth-logger.js';

export interface AuthRuntimeStats {
  activeSessions: number;
  registeredUsers: number;
  cachedIdentities: number;
}

export class AuthRuntime {
  private closed = false;

  private constructor(
    readonly config: AppConfig,
    readonly connection: DatabaseConnection,
    readonly sessions: SqliteSessionStore,
    readonly credentials: CredentialRegistry,
    readonly authService: AuthService,
    readonly identities: IdentityCache,
    private readonly cleanupJob: SessionCleanupJob
  ) {}

  /**
   * Open both stores and build the service graph. Fails with
   * StoreUnavailableError when either store cannot be read.
   */
  static create(config: AppConfig): AuthRuntime {
    const ttlMs = sessionTtlMs(config.session);

    const connection = new DatabaseConnection({
      path: config.session.dbPath,
      busyTimeoutMs: config.session.busyTimeoutMs,
    });

    try {
      const sessions = new SqliteSessionStore(connection, { ttlMs });
      const credentials = new CredentialRegistry(
        { path: config.credentials.path },
        new SqliteCredentialWriteLock(connection)
      );
      credentials.init();

      const passwords = new PasswordVerifier({
        ...config.passwordHash,
        allowPlaintext: config.credentials.allowPlaintextPasswords,
      });
      const propagator = new SessionPropagator({
        cookieName: config.session.cookieName,
        linkParam: config.session.linkParam,
        ttlMs,
      });
      const authService = new AuthService(credentials, sessions, passwords, propagator, {
        sessionTtlMs: ttlMs,
      });

      const identities = new IdentityCache({
        maxSize: config.identityCache.maxSize,
        idleMs: config.identityCache.idleMinutes * 60 * 1000,
        cleanupIntervalMs: 5 * 60 * 1000,
      });

      const cleanupJob = new SessionCleanupJob(sessions, {
        intervalMs: config.session.cleanupIntervalMs,
        enabled: config.server.nodeEnv !== 'test',
        logEnabled: true,
      });

      return new AuthRuntime(
        config,
        connection,
        sessions,
        credentials,
        authService,
        identities,
        cleanupJob
      );
    } catch (error) {
      connection.close();
      throw error;
    }
  }

  /**
   * Start background housekeeping (expired-session sweep, idle identities)
   */
  start(): void {
    this.cleanupJob.start();
    this.identities.start();
  }

  getStats(): AuthRuntimeStats {
    return {
      activeSessions: this.sessions.countActive(),
      registeredUsers: this.credentials.count(),
      cachedIdentities: this.identities.size,
    };
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;

    this.cleanupJob.stop();
    this.identities.stop();
    this.identities.clear();
    this.connection.close();
    authLogger.info('Auth runtime closed');
  }
}

/**
 * Build a runtime from the environment (or an explicit config in tests)
 */
export function createAuthRuntime(config: AppConfig = buildAppConfig(process.env)): AuthRuntime {
  return AuthRuntime.create(config);
}
