import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import { ProcessLocalIdentity } from '@/application/auth/ProcessLocalIdentity.js';
import { INVALID_CREDENTIALS_MESSAGE, MISSING_CREDENTIALS_MESSAGE } from '@/application/auth/AuthService.js';
import { AuthError } from '@/utils/errors.js';
import { authMetrics, AUTH_METRICS } from '@/utils/auth-logger.js';
import {
  InMemoryChannel,
  TEST_TTL_MS,
  makeTempDir,
  readCredentialFile,
  removeTempDir,
  startProcess,
  writeCredentialFile,
  type TestProcess,
} from '../../../helpers/fixtures.js';

describe('AuthService', () => {
  let dir: string;
  let credentialsPath: string;
  let home: TestProcess;
  let reports: TestProcess;

  beforeEach(() => {
    authMetrics.reset();
    dir = makeTempDir();
    credentialsPath = join(dir, 'credentials.json');
    writeCredentialFile(credentialsPath, {
      alice: {
        name: 'Alice',
        email: 'alice@example.com',
        password: 'secret',
        role: 'subscriber',
        subscription_tier: 'pro',
        subscription_status: 'active',
      },
      root: { name: 'Root', email: 'root@example.com', password: 'root-pass', role: 'admin' },
    });
    home = startProcess(dir);
    reports = startProcess(dir);
  });

  afterEach(() => {
    home.close();
    reports.close();
    removeTempDir(dir);
  });

  describe('login', () => {
    it('creates a shared session, sets the cookie and greets the user', async () => {
      const identity = new ProcessLocalIdentity();
      const channel = new InMemoryChannel();

      const result = await home.authService.login(identity, channel, 'alice', 'secret');

      expect(result).toEqual({ success: true, message: 'Welcome back, Alice!' });
      expect(identity.isAuthenticated).toBe(true);
      expect(channel.cookieWrites).toEqual([
        { name: 'sso_session_id', value: identity.sessionId, maxAgeMs: TEST_TTL_MS },
      ]);
      expect(reports.sessions.get(identity.sessionId ?? '')?.role).toBe('subscriber');
      expect(authMetrics.getCounter(AUTH_METRICS.LOGIN_SUCCESS)).toBe(1);
    });

    it('gives the same answer for a wrong password and an unknown user', async () => {
      const channel = new InMemoryChannel();

      const wrong = await home.authService.login(new ProcessLocalIdentity(), channel, 'alice', 'nope');
      const unknown = await home.authService.login(new ProcessLocalIdentity(), channel, 'mallory', 'secret');

      expect(wrong).toEqual({ success: false, message: INVALID_CREDENTIALS_MESSAGE });
      expect(unknown).toEqual(wrong);
      expect(channel.cookieWrites).toEqual([]);
      expect(home.sessions.countActive()).toBe(0);
    });

    it('requires both fields', async () => {
      const result = await home.authService.login(new ProcessLocalIdentity(), new InMemoryChannel(), 'alice', '');
      expect(result).toEqual({ success: false, message: MISSING_CREDENTIALS_MESSAGE });
    });

    it('upgrades a plain-text password to argon2 on success', async () => {
      await home.authService.login(new ProcessLocalIdentity(), new InMemoryChannel(), 'alice', 'secret');

      const stored = readCredentialFile(credentialsPath).credentials.usernames.alice;
      expect(stored.password.startsWith('$argon2id$')).toBe(true);
      expect(stored.role).toBe('subscriber');
      expect(authMetrics.getCounter(AUTH_METRICS.PASSWORD_REHASHED)).toBe(1);

      // The sibling process picks up the new hash
      const again = await reports.authService.login(new ProcessLocalIdentity(), new InMemoryChannel(), 'alice', 'secret');
      expect(again.success).toBe(true);
    });

    it('fails the login cleanly for a corrupt bcrypt entry', async () => {
      writeCredentialFile(credentialsPath, {
        bob: { name: 'Bob', email: 'bob@example.com', password: `$2b$99$${'a'.repeat(53)}`, role: 'user' },
      });

      const result = await home.authService.login(new ProcessLocalIdentity(), new InMemoryChannel(), 'bob', 'pw');
      expect(result).toEqual({ success: false, message: INVALID_CREDENTIALS_MESSAGE });
      expect(home.sessions.countActive()).toBe(0);
    });

    it('refuses plain-text entries when the fallback is disabled', async () => {
      const strict = startProcess(dir, { allowPlaintext: false });
      try {
        const result = await strict.authService.login(new ProcessLocalIdentity(), new InMemoryChannel(), 'alice', 'secret');
        expect(result).toEqual({ success: false, message: INVALID_CREDENTIALS_MESSAGE });
      } finally {
        strict.close();
      }
    });

    it('keeps the caller\'s previous session valid on a repeat login', async () => {
      const identity = new ProcessLocalIdentity();
      const channel = new InMemoryChannel();

      await home.authService.login(identity, channel, 'alice', 'secret');
      const first = identity.sessionId ?? '';
      await home.authService.login(identity, channel, 'alice', 'secret');

      expect(identity.sessionId).not.toBe(first);
      expect(home.sessions.get(first)?.username).toBe('alice');
      expect(home.sessions.countActive()).toBe(2);
    });
  });

  describe('single sign-on across front ends', () => {
    it('carries a login into a sibling app through a link', async () => {
      const browser = new Map<string, string>();
      const homeAuth = home.authService.bind(new ProcessLocalIdentity(), new InMemoryChannel(browser));
      await homeAuth.login('alice', 'secret');

      const link = homeAuth.embedInLink('http://localhost:8502');
      const sessionId = new URL(link).searchParams.get('sessionId') ?? '';
      expect(sessionId).toBe(homeAuth.identity.sessionId);

      // Fresh browser profile: only the link carries the session
      const arrival = new InMemoryChannel();
      arrival.query.set('sessionId', sessionId);
      const reportsAuth = reports.authService.bind(new ProcessLocalIdentity(), arrival);

      expect(reportsAuth.resolve().source).toBe('link');
      expect(reportsAuth.currentUser()).toEqual({
        username: 'alice',
        displayName: 'Alice',
        email: 'alice@example.com',
        role: 'subscriber',
        subscriptionTier: 'pro',
        subscriptionStatus: 'active',
      });
      expect(reportsAuth.hasAccess('subscriber')).toBe(true);
      expect(reportsAuth.hasAccess('admin')).toBe(false);
      expect(arrival.cookies.get('sso_session_id')).toBe(sessionId);
    });

    it('a repeat login in one app leaves a linked sibling signed in', async () => {
      const homeAuth = home.authService.bind(new ProcessLocalIdentity(), new InMemoryChannel());
      await homeAuth.login('alice', 'secret');

      // Sibling on another domain: only the link carries the session
      const arrival = new InMemoryChannel();
      arrival.query.set('sessionId', homeAuth.identity.sessionId ?? '');
      const reportsIdentity = new ProcessLocalIdentity();
      expect(reports.authService.bind(reportsIdentity, arrival).resolve().status).toBe('authenticated');

      await homeAuth.login('alice', 'secret');

      const next = reports.authService.bind(reportsIdentity, new InMemoryChannel(arrival.cookies));
      expect(next.resolve()).toMatchObject({ status: 'authenticated', source: 'state' });
    });

    it('logging out in one app logs the user out of the other', async () => {
      const browser = new Map<string, string>();
      const homeIdentity = new ProcessLocalIdentity();
      const reportsIdentity = new ProcessLocalIdentity();

      await home.authService.bind(homeIdentity, new InMemoryChannel(browser)).login('alice', 'secret');
      expect(reports.authService.bind(reportsIdentity, new InMemoryChannel(browser)).resolve().status).toBe(
        'authenticated'
      );

      expect(reports.authService.bind(reportsIdentity, new InMemoryChannel(browser)).logout()).toBe(true);
      expect(browser.has('sso_session_id')).toBe(false);

      const next = home.authService.bind(homeIdentity, new InMemoryChannel(browser));
      expect(next.resolve().status).toBe('anonymous');
      expect(next.isAuthenticated()).toBe(false);
    });

    it('logoutEverywhere ends every session of the user', async () => {
      const laptop = home.authService.bind(new ProcessLocalIdentity(), new InMemoryChannel());
      const phone = reports.authService.bind(new ProcessLocalIdentity(), new InMemoryChannel());
      const admin = home.authService.bind(new ProcessLocalIdentity(), new InMemoryChannel());
      await laptop.login('alice', 'secret');
      await phone.login('alice', 'secret');
      await admin.login('root', 'root-pass');

      expect(laptop.logoutEverywhere()).toBe(2);
      expect(phone.resolve().status).toBe('anonymous');
      expect(admin.resolve().status).toBe('authenticated');
    });

    it('logoutEverywhere requires a signed-in caller', () => {
      const auth = home.authService.bind(new ProcessLocalIdentity(), new InMemoryChannel());
      expect(() => auth.logoutEverywhere()).toThrow(AuthError);
    });

    it('leaves links untouched for anonymous callers', () => {
      const auth = home.authService.bind(new ProcessLocalIdentity(), new InMemoryChannel());
      expect(auth.embedInLink('http://localhost:8502')).toBe('http://localhost:8502');
      expect(auth.hasAccess('public')).toBe(true);
      expect(auth.hasAccess('user')).toBe(false);
    });
  });

  describe('register', () => {
    it('adds a user who can then log in from any app', async () => {
      const result = await home.authService.register({
        username: 'carol',
        password: 'carol-pass',
        email: 'carol@example.com',
        displayName: 'Carol',
      });
      expect(result).toEqual({ success: true, username: 'carol' });

      const stored = readCredentialFile(credentialsPath).credentials.usernames.carol;
      expect(stored.password.startsWith('$argon2id$')).toBe(true);
      expect(stored.role).toBe('user');

      const login = await reports.authService.login(new ProcessLocalIdentity(), new InMemoryChannel(), 'carol', 'carol-pass');
      expect(login).toEqual({ success: true, message: 'Welcome back, Carol!' });
    });

    it('logs a registered subscriber in with the registered role', async () => {
      const registered = await home.authService.register({
        username: 'dana',
        password: 'correct-horse',
        email: 'd@x.com',
        displayName: 'Dana',
        role: 'subscriber',
      });
      expect(registered.success).toBe(true);

      const auth = home.authService.bind(new ProcessLocalIdentity(), new InMemoryChannel());
      expect(await auth.login('dana', 'wrong')).toEqual({ success: false, message: INVALID_CREDENTIALS_MESSAGE });
      expect(await auth.login('dana', 'correct-horse')).toEqual({ success: true, message: 'Welcome back, Dana!' });
      expect(auth.currentUser()).toMatchObject({ role: 'subscriber', subscriptionTier: 'free' });
      expect(auth.hasAccess('admin')).toBe(false);
      expect(auth.hasAccess('subscriber')).toBe(true);
    });

    it('rejects a taken username and leaves the existing entry alone', async () => {
      const result = await reports.authService.register({
        username: 'alice',
        password: 'other',
        email: 'new@example.com',
        displayName: 'Impostor',
      });

      expect(result).toEqual({ success: false, reason: 'USERNAME_TAKEN', message: 'Username already exists' });
      const stored = readCredentialFile(credentialsPath).credentials.usernames.alice;
      expect(stored.password).toBe('secret');
      expect(stored.role).toBe('subscriber');
    });

    it('rejects a taken email', async () => {
      const result = await home.authService.register({
        username: 'alice2',
        password: 'other',
        email: 'ALICE@example.com',
        displayName: 'Alice Two',
      });
      expect(result).toEqual({ success: false, reason: 'EMAIL_TAKEN', message: 'Email already registered' });
    });

    it('validates the username', async () => {
      await expect(
        home.authService.register({
          username: '__proto__',
          password: 'pw',
          email: 'p@example.com',
          displayName: 'P',
        })
      ).rejects.toMatchObject({ code: 'INVALID_USERNAME' });
    });
  });
});
