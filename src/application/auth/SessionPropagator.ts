// Application: Session Propagator
// Carries the session token to sibling front ends (links) and across reloads (cookie)

import type { RequestChannel } from '@/domain/identity/types.js';

export interface SessionPropagatorConfig {
  cookieName: string;
  linkParam: string;
  ttlMs: number;
}

export class SessionPropagator {
  constructor(private config: SessionPropagatorConfig) {}

  get cookieName(): string {
    return this.config.cookieName;
  }

  get linkParam(): string {
    return this.config.linkParam;
  }

  /**
   * Append the session token to an outbound link. Only the query changes:
   * scheme, authority, path and fragment come back as given, so relative and
   * protocol-relative links keep pointing where they did. Without a session
   * the link is returned exactly as given.
   */
  embedInLink(url: string, sessionId: string | null | undefined): string {
    if (!sessionId) return url;

    const hashAt = url.indexOf('#');
    const beforeHash = hashAt === -1 ? url : url.slice(0, hashAt);
    const fragment = hashAt === -1 ? '' : url.slice(hashAt);

    const queryAt = beforeHash.indexOf('?');
    const path = queryAt === -1 ? beforeHash : beforeHash.slice(0, queryAt);
    const query = queryAt === -1 ? '' : beforeHash.slice(queryAt + 1);

    const key = encodeURIComponent(this.config.linkParam);
    const pairs = query
      .split('&')
      .filter((pair) => pair !== '' && pair.split('=')[0] !== key);
    pairs.push(`${key}=${encodeURIComponent(sessionId)}`);

    return `${path}?${pairs.join('&')}${fragment}`;
  }

  readCookie(channel: RequestChannel): string | undefined {
    return channel.getCookie(this.config.cookieName);
  }

  setCookie(channel: RequestChannel, sessionId: string, maxAgeMs: number = this.config.ttlMs): void {
    channel.setCookie(this.config.cookieName, sessionId, Math.max(0, maxAgeMs));
  }

  /**
   * Cookie lifetime matching a session that ends at `expiresAt`
   */
  setCookieUntil(channel: RequestChannel, sessionId: string, expiresAt: Date): void {
    this.setCookie(channel, sessionId, expiresAt.getTime() - Date.now());
  }

  clearCookie(channel: RequestChannel): void {
    channel.clearCookie(this.config.cookieName);
  }
}
