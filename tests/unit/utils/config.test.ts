import { describe, it, expect } from 'vitest';
import { buildAppConfig, buildSessionConfig, sessionTtlMs, validateConfig } from '@/utils/config.js';

describe('buildAppConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    const config = buildAppConfig({});

    expect(config.server.port).toBe(3000);
    expect(config.server.nodeEnv).toBe('development');
    expect(config.session.dbPath).toBe('./data/auth_sessions.db');
    expect(config.session.ttlDays).toBe(30);
    expect(config.session.cookieName).toBe('sso_session_id');
    expect(config.session.linkParam).toBe('sessionId');
    expect(config.credentials.path).toBe('./data/credentials.json');
    expect(config.credentials.allowPlaintextPasswords).toBe(true);
    expect(validateConfig(config)).toEqual([]);
  });

  it('reads overrides from the environment', () => {
    const config = buildAppConfig({
      PORT: '8502',
      NODE_ENV: 'production',
      SSO_SESSION_TTL_DAYS: '7',
      SSO_ALLOW_PLAINTEXT_PASSWORDS: 'false',
      CORS_ORIGINS: 'http://a.test, http://b.test',
    });

    expect(config.server.port).toBe(8502);
    expect(config.server.nodeEnv).toBe('production');
    expect(config.session.ttlDays).toBe(7);
    expect(config.credentials.allowPlaintextPasswords).toBe(false);
    expect(config.server.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
  });
});

describe('sessionTtlMs', () => {
  it('converts days to milliseconds', () => {
    expect(sessionTtlMs(buildSessionConfig({ SSO_SESSION_TTL_DAYS: '2' }))).toBe(2 * 24 * 60 * 60 * 1000);
  });
});

describe('validateConfig', () => {
  it('reports each invalid setting', () => {
    const config = buildAppConfig({
      PORT: '70000',
      SSO_SESSION_TTL_DAYS: '0',
      SSO_COOKIE_NAME: 'same',
      SSO_CLIENT_COOKIE_NAME: 'same',
    });

    expect(validateConfig(config)).toEqual([
      'Invalid port number',
      'Session TTL must be a positive number of days (SSO_SESSION_TTL_DAYS)',
      'Session cookie and client cookie must have different names',
    ]);
  });
});
