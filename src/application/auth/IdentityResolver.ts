// Application: Identity Resolver
// Discovers the caller's session through an ordered list of lookup strategies

import type { ISessionStore } from '@/domain/user/repository.js';
import { toProfile } from '@/domain/user/types.js';
import type {
  IdentitySnapshot,
  LookupSource,
  RequestChannel,
  ResolutionOutcome,
  SessionLookupResult,
  SessionLookupStrategy,
} from '@/domain/identity/types.js';
import type { ProcessLocalIdentity } from './ProcessLocalIdentity.js';
import type { SessionPropagator } from './SessionPropagator.js';
import { authLogger, authMetrics, AUTH_METRICS, redactSessionId } from '@/utils/auth-logger.js';

// ==================== Lookup Strategies ====================

/**
 * Tier 1: the id this process already resolved for the caller. Re-validated
 * every time, since another tab or app may have logged out meanwhile.
 */
export class ProcessStateLookup implements SessionLookupStrategy {
  readonly source: LookupSource = 'state';

  lookup(_channel: RequestChannel, identity: IdentitySnapshot): SessionLookupResult {
    return identity.sessionId ? { found: true, sessionId: identity.sessionId } : { found: false };
  }
}

/**
 * Tier 2: token handed over by a sibling app's navigation link
 */
export class LinkParameterLookup implements SessionLookupStrategy {
  readonly source: LookupSource = 'link';

  constructor(private propagator: SessionPropagator) {}

  lookup(channel: RequestChannel): SessionLookupResult {
    const sessionId = channel.getQueryParam(this.propagator.linkParam);
    return sessionId ? { found: true, sessionId } : { found: false };
  }

  onResolved(channel: RequestChannel, sessionId: string, expiresAt: Date): void {
    this.propagator.setCookieUntil(channel, sessionId, expiresAt);
  }

  // Off the visible URL whatever the outcome, even when an earlier tier won
  onSettled(channel: RequestChannel): void {
    if (channel.getQueryParam(this.propagator.linkParam) !== undefined) {
      channel.stripQueryParam(this.propagator.linkParam);
    }
  }
}

/**
 * Tier 3: long-lived browser cookie from an earlier login or hand-over
 */
export class CookieLookup implements SessionLookupStrategy {
  readonly source: LookupSource = 'cookie';

  constructor(private propagator: SessionPropagator) {}

  lookup(channel: RequestChannel): SessionLookupResult {
    const sessionId = this.propagator.readCookie(channel);
    return sessionId ? { found: true, sessionId } : { found: false };
  }

  onStale(channel: RequestChannel): void {
    this.propagator.clearCookie(channel);
  }
}

export function defaultLookupStrategies(propagator: SessionPropagator): SessionLookupStrategy[] {
  return [
    new ProcessStateLookup(),
    new LinkParameterLookup(propagator),
    new CookieLookup(propagator),
  ];
}

// ==================== Resolver ====================

export class IdentityResolver {
  constructor(
    private sessions: ISessionStore,
    private strategies: SessionLookupStrategy[]
  ) {}

  /**
   * Walk the strategies in order; the first token that names a valid session
   * wins. A stale token is reported to its strategy and the walk continues.
   * Store failures leave the identity unresolved and propagate: never fail open.
   */
  resolve(identity: ProcessLocalIdentity, channel: RequestChannel): ResolutionOutcome {
    identity.beginResolution();

    try {
      const rejected = new Set<string>();

      for (const strategy of this.strategies) {
        const result = strategy.lookup(channel, identity);
        if (!result.found) continue;

        const { sessionId } = result;
        const session = rejected.has(sessionId) ? null : this.sessions.get(sessionId);

        if (!session) {
          rejected.add(sessionId);
          authMetrics.increment(AUTH_METRICS.SESSION_STALE);
          authLogger.debug('Stale session token', {
            source: strategy.source,
            sessionId: redactSessionId(sessionId),
          });
          strategy.onStale?.(channel, sessionId);
          continue;
        }

        const profile = toProfile(session);
        identity.authenticate(session.sessionId, profile, session.expiresAt, strategy.source);
        this.sessions.touch(session.sessionId);
        strategy.onResolved?.(channel, session.sessionId, session.expiresAt);

        authMetrics.increment(AUTH_METRICS.SESSION_RESOLVED);
        authLogger.debug('Session resolved', {
          source: strategy.source,
          sessionId: redactSessionId(session.sessionId),
          username: session.username,
        });

        return { status: 'authenticated', source: strategy.source, profile };
      }

      identity.demote();
      return { status: 'anonymous', source: null, profile: null };
    } catch (error) {
      identity.abortResolution();
      throw error;
    } finally {
      for (const strategy of this.strategies) {
        strategy.onSettled?.(channel);
      }
    }
  }
}
