import { describe, it, expect } from 'vitest';
import { ProcessLocalIdentity } from '@/application/auth/ProcessLocalIdentity.js';
import type { UserProfile } from '@/domain/user/types.js';
import { IdentityStateError } from '@/utils/errors.js';

const profile: UserProfile = {
  username: 'alice',
  displayName: 'Alice',
  email: 'alice@example.com',
  role: 'user',
  subscriptionTier: 'free',
  subscriptionStatus: 'inactive',
};

describe('ProcessLocalIdentity', () => {
  it('starts unresolved and anonymous-looking', () => {
    const identity = new ProcessLocalIdentity();
    expect(identity.status).toBe('unresolved');
    expect(identity.isAuthenticated).toBe(false);
    expect(identity.sessionId).toBeNull();
  });

  it('moves through resolving to authenticated', () => {
    const identity = new ProcessLocalIdentity();
    identity.beginResolution();
    expect(identity.status).toBe('resolving');

    identity.authenticate('sid-1', profile, new Date('2026-02-01T00:00:00Z'), 'cookie');
    expect(identity.status).toBe('authenticated');
    expect(identity.source).toBe('cookie');
    expect(identity.profile).toEqual(profile);
  });

  it('hands out copies of the profile', () => {
    const identity = new ProcessLocalIdentity();
    identity.authenticate('sid-1', profile, new Date());

    const copy = identity.profile;
    if (copy) copy.role = 'superadmin';
    expect(identity.profile?.role).toBe('user');
  });

  it('refuses to start a second resolution while one is running', () => {
    const identity = new ProcessLocalIdentity();
    identity.beginResolution();
    expect(() => identity.beginResolution()).toThrow(IdentityStateError);
  });

  it('keeps the cached id when a resolution is aborted', () => {
    const identity = new ProcessLocalIdentity();
    identity.authenticate('sid-1', profile, new Date());
    identity.beginResolution();
    identity.abortResolution();

    expect(identity.status).toBe('unresolved');
    expect(identity.sessionId).toBe('sid-1');
    expect(identity.profile).toBeNull();
  });

  it('demote clears everything', () => {
    const identity = new ProcessLocalIdentity();
    identity.authenticate('sid-1', profile, new Date());
    identity.demote();

    expect(identity.status).toBe('anonymous');
    expect(identity.sessionId).toBeNull();
    expect(identity.profile).toBeNull();
  });
});
