// Infrastructure: Session Cleanup Job
// Periodic background sweep of expired sessions

import type { ISessionStore } from '@/domain/user/repository.js';
import { cleanupLogger, authMetrics, AUTH_METRICS } from '@/utils/auth-logger.js';

export interface SessionCleanupConfig {
  intervalMs: number;      // Cleanup interval (default: 1 hour)
  enabled: boolean;        // Whether cleanup is enabled
  logEnabled: boolean;     // Whether to log cleanup activity
}

/**
 * SessionCleanupJob - Periodic cleanup of expired sessions
 *
 * Every front-end process may run one; the sweep is a single DELETE, so
 * overlapping sweeps from several processes only race to delete the same rows.
 * Lookups delete expired rows lazily as well, so the sweep only bounds table growth.
 */
export class SessionCleanupJob {
  private intervalId: NodeJS.Timeout | null = null;

  constructor(
    private sessionStore: ISessionStore,
    private config: SessionCleanupConfig
  ) {}

  /**
   * Start the periodic cleanup job
   */
  start(): void {
    if (!this.config.enabled || this.config.intervalMs <= 0) {
      if (this.config.logEnabled) {
        cleanupLogger.info('Cleanup disabled, not starting');
      }
      return;
    }

    if (this.intervalId) {
      if (this.config.logEnabled) {
        cleanupLogger.warn('Already running');
      }
      return;
    }

    // Run immediately on start
    this.runSafely('Initial cleanup failed');

    this.intervalId = setInterval(() => {
      this.runSafely('Periodic cleanup failed');
    }, this.config.intervalMs);

    // Never keep a front end alive just for the sweep
    this.intervalId.unref();

    if (this.config.logEnabled) {
      cleanupLogger.info('Started', { intervalMs: this.config.intervalMs });
    }
  }

  /**
   * Stop the periodic cleanup job
   */
  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;

      if (this.config.logEnabled) {
        cleanupLogger.info('Stopped');
      }
    }
  }

  /**
   * Perform one sweep of expired sessions
   */
  runOnce(): number {
    authMetrics.increment(AUTH_METRICS.CLEANUP_RUN);
    const deleted = this.sessionStore.sweepExpired();

    if (deleted > 0) {
      authMetrics.increment(AUTH_METRICS.CLEANUP_SESSIONS_REMOVED, deleted);
      cleanupLogger.info('Removed expired sessions', { count: deleted });
    } else if (this.config.logEnabled) {
      cleanupLogger.debug('No expired sessions to remove');
    }

    return deleted;
  }

  /**
   * Get current status
   */
  getStatus(): { running: boolean; intervalMs: number; enabled: boolean } {
    return {
      running: this.intervalId !== null,
      intervalMs: this.config.intervalMs,
      enabled: this.config.enabled,
    };
  }

  private runSafely(failureMessage: string): void {
    try {
      this.runOnce();
    } catch (error) {
      cleanupLogger.error(failureMessage, { error: String(error) });
    }
  }
}
