// Application: Process-local identity
// In-memory copy of one caller's session; never the source of truth

import type { UserProfile } from '@/domain/user/types.js';
import type { IdentitySnapshot, IdentityStatus, LookupSource } from '@/domain/identity/types.js';
import { IdentityStateError } from '@/utils/errors.js';

/**
 * Unresolved -> Resolving -> { Authenticated | Anonymous }
 *
 * A settled identity re-enters Resolving on the next request, and login or
 * logout may settle it directly. An aborted resolution (store failure) drops
 * back to Unresolved but keeps the cached session id for the next attempt.
 */
export class ProcessLocalIdentity implements IdentitySnapshot {
  private _status: IdentityStatus = 'unresolved';
  private _sessionId: string | null = null;
  private _profile: UserProfile | null = null;
  private _expiresAt: Date | null = null;
  private _source: LookupSource | null = null;

  get status(): IdentityStatus {
    return this._status;
  }

  get sessionId(): string | null {
    return this._sessionId;
  }

  get profile(): UserProfile | null {
    return this._profile ? { ...this._profile } : null;
  }

  get expiresAt(): Date | null {
    return this._expiresAt;
  }

  /** Tier that produced the current session, or null after a direct login */
  get source(): LookupSource | null {
    return this._source;
  }

  get isAuthenticated(): boolean {
    return this._status === 'authenticated';
  }

  beginResolution(): void {
    if (this._status === 'resolving') {
      throw new IdentityStateError('Identity is already being resolved');
    }
    this._status = 'resolving';
  }

  authenticate(
    sessionId: string,
    profile: UserProfile,
    expiresAt: Date,
    source: LookupSource | null = null
  ): void {
    this._status = 'authenticated';
    this._sessionId = sessionId;
    this._profile = { ...profile };
    this._expiresAt = expiresAt;
    this._source = source;
  }

  demote(): void {
    this._status = 'anonymous';
    this._sessionId = null;
    this._profile = null;
    this._expiresAt = null;
    this._source = null;
  }

  abortResolution(): void {
    if (this._status !== 'resolving') return;
    this._status = 'unresolved';
    this._profile = null;
    this._expiresAt = null;
    this._source = null;
  }
}
