// Domain: Identity resolution types
// Transport-neutral view of a request and the session lookup chain

import type { UserProfile } from '../user/types.js';

export type IdentityStatus = 'unresolved' | 'resolving' | 'authenticated' | 'anonymous';

export type LookupSource = 'state' | 'link' | 'cookie';

/**
 * What the resolver and propagator may read from and write to the
 * caller's browser for the current request
 */
export interface RequestChannel {
  getQueryParam(name: string): string | undefined;
  /** Remove a parameter from the URL the browser shows */
  stripQueryParam(name: string): void;
  getCookie(name: string): string | undefined;
  setCookie(name: string, value: string, maxAgeMs: number): void;
  clearCookie(name: string): void;
}

export type SessionLookupResult =
  | { found: true; sessionId: string }
  | { found: false };

/**
 * Read-only view of the process-local identity that lookups may consult
 */
export interface IdentitySnapshot {
  readonly status: IdentityStatus;
  readonly sessionId: string | null;
  readonly profile: UserProfile | null;
}

/**
 * One tier of the session discovery chain
 */
export interface SessionLookupStrategy {
  readonly source: LookupSource;
  lookup(channel: RequestChannel, identity: IdentitySnapshot): SessionLookupResult;
  /** Called after this tier's token resolved to a valid session */
  onResolved?(channel: RequestChannel, sessionId: string, expiresAt: Date): void;
  /** Called after this tier's token turned out to be stale */
  onStale?(channel: RequestChannel, sessionId: string): void;
  /** Called once per resolution, whichever tier won, so a tier can tidy the request */
  onSettled?(channel: RequestChannel): void;
}

export interface ResolutionOutcome {
  status: 'authenticated' | 'anonymous';
  source: LookupSource | null;
  profile: UserProfile | null;
}
