// Infrastructure: Identity Cache
// Per-process LRU of caller identities, keyed by the browser's client cookie.
// Holds only the process-local copy; the shared session table stays authoritative.

import { ProcessLocalIdentity } from '@/application/auth/ProcessLocalIdentity.js';
import { authLogger, authMetrics, AUTH_METRICS } from '@/utils/auth-logger.js';

export interface IdentityCacheConfig {
  maxSize: number;           // Max cached identities
  idleMs: number;            // Dropped after this long without a request
  cleanupIntervalMs: number; // 0 disables the periodic sweep
}

interface CachedIdentity {
  identity: ProcessLocalIdentity;
  lastSeenAt: number;
}

export class IdentityCache {
  // Map iteration order doubles as recency order: oldest first
  private entries: Map<string, CachedIdentity> = new Map();
  private cleanupTimer: NodeJS.Timeout | null = null;

  constructor(private config: IdentityCacheConfig) {}

  /**
   * Identity for a client, created unresolved on first sight or after idling out
   */
  acquire(clientId: string): ProcessLocalIdentity {
    const now = Date.now();
    const cached = this.entries.get(clientId);

    if (cached && now - cached.lastSeenAt <= this.config.idleMs) {
      this.entries.delete(clientId);
      cached.lastSeenAt = now;
      this.entries.set(clientId, cached);
      return cached.identity;
    }

    if (cached) {
      this.entries.delete(clientId);
      authLogger.debug('Identity idled out', { idleMs: now - cached.lastSeenAt });
    }

    while (this.entries.size > 0 && this.entries.size >= this.config.maxSize) {
      this.evictOldest();
    }

    const identity = new ProcessLocalIdentity();
    this.entries.set(clientId, { identity, lastSeenAt: now });
    authMetrics.setGauge(AUTH_METRICS.CACHED_IDENTITIES, this.entries.size);
    return identity;
  }

  has(clientId: string): boolean {
    return this.entries.has(clientId);
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
    authMetrics.setGauge(AUTH_METRICS.CACHED_IDENTITIES, 0);
  }

  /**
   * Drop identities idle for longer than the configured window
   */
  sweep(): number {
    const now = Date.now();
    let removed = 0;

    for (const [key, value] of this.entries) {
      if (now - value.lastSeenAt > this.config.idleMs) {
        this.entries.delete(key);
        removed++;
      }
    }

    if (removed > 0) {
      authMetrics.setGauge(AUTH_METRICS.CACHED_IDENTITIES, this.entries.size);
      authLogger.debug('Swept idle identities', { count: removed });
    }
    return removed;
  }

  start(): void {
    if (this.cleanupTimer || this.config.cleanupIntervalMs <= 0) return;

    this.cleanupTimer = setInterval(() => {
      this.sweep();
    }, this.config.cleanupIntervalMs);
    this.cleanupTimer.unref();
  }

  stop(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  private evictOldest(): void {
    const oldest = this.entries.keys().next();
    if (oldest.done) return;
    this.entries.delete(oldest.value);
    authLogger.debug('Evicted least recently used identity');
  }
}
