// Application: Authentication Service
// Handles login, logout, registration and per-request identity resolution

import type {
  RegistrationData,
  RegistrationResult,
  LoginResult,
  UserProfile,
  UserCredential,
} from '@/domain/user/types.js';
import { toProfile } from '@/domain/user/types.js';
import type { ICredentialRegistry, ISessionStore } from '@/domain/user/repository.js';
import { hasAccess as roleHasAccess, normalizeRole } from '@/domain/user/roles.js';
import type { RequestChannel, ResolutionOutcome } from '@/domain/identity/types.js';
import type { PasswordVerifier } from './PasswordVerifier.js';
import type { SessionPropagator } from './SessionPropagator.js';
import { IdentityResolver, defaultLookupStrategies } from './IdentityResolver.js';
import type { ProcessLocalIdentity } from './ProcessLocalIdentity.js';
import { RequestAuth } from './RequestAuth.js';
import { AuthError } from '@/utils/errors.js';
import { authLogger, authMetrics, AUTH_METRICS, redactSessionId } from '@/utils/auth-logger.js';

export interface AuthServiceConfig {
  sessionTtlMs: number;
}

export const INVALID_CREDENTIALS_MESSAGE = 'invalid username or password';
export const MISSING_CREDENTIALS_MESSAGE = 'Username and password are required';

// Starts with a letter or digit, so keys such as __proto__ never reach the credential map
export const USERNAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]{1,63}$/;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+$/;

export class AuthService {
  private resolver: IdentityResolver;

  constructor(
    private credentials: ICredentialRegistry,
    private sessions: ISessionStore,
    private passwords: PasswordVerifier,
    private propagator: SessionPropagator,
    private config: AuthServiceConfig = { sessionTtlMs: 30 * 24 * 60 * 60 * 1000 },
    resolver?: IdentityResolver
  ) {
    this.resolver = resolver ?? new IdentityResolver(sessions, defaultLookupStrategies(propagator));
  }

  /**
   * Page-boundary view of this service for one request
   */
  bind(identity: ProcessLocalIdentity, channel: RequestChannel): RequestAuth {
    return new RequestAuth(this, identity, channel);
  }

  /**
   * Run the session discovery chain; call once per request before anything else
   */
  resolve(identity: ProcessLocalIdentity, channel: RequestChannel): ResolutionOutcome {
    return this.resolver.resolve(identity, channel);
  }

  /**
   * Login user. Unknown usernames and wrong passwords get the same answer.
   */
  async login(
    identity: ProcessLocalIdentity,
    channel: RequestChannel,
    username: string,
    password: string
  ): Promise<LoginResult> {
    if (!username || !password) {
      authMetrics.increment(AUTH_METRICS.LOGIN_FAILURE);
      return { success: false, message: MISSING_CREDENTIALS_MESSAGE };
    }

    try {
      const credential = this.credentials.findByUsername(username);
      if (!credential) {
        authMetrics.increment(AUTH_METRICS.LOGIN_FAILURE);
        authLogger.warn('Login failed: user not found', { username });
        return { success: false, message: INVALID_CREDENTIALS_MESSAGE };
      }

      const verification = await this.passwords.verify(password, credential.passwordHash, username);
      if (!verification.valid) {
        authMetrics.increment(AUTH_METRICS.LOGIN_FAILURE);
        authLogger.warn('Login failed: invalid password', { username, scheme: verification.scheme });
        return { success: false, message: INVALID_CREDENTIALS_MESSAGE };
      }

      if (verification.needsRehash) {
        await this.upgradePasswordHash(credential, password);
      }

      // Earlier sessions stay valid: sibling apps may still hold them from a link
      const session = this.sessions.create(credential.username, toProfile(credential));

      this.propagator.setCookie(channel, session.sessionId, this.config.sessionTtlMs);
      identity.authenticate(session.sessionId, toProfile(session), session.expiresAt);

      authMetrics.increment(AUTH_METRICS.LOGIN_SUCCESS);
      authLogger.info('User logged in', {
        username: credential.username,
        sessionId: redactSessionId(session.sessionId),
        scheme: verification.scheme,
      });

      return { success: true, message: `Welcome back, ${credential.displayName}!` };
    } catch (error) {
      authMetrics.increment(AUTH_METRICS.LOGIN_FAILURE);
      authLogger.error('Login error', { username, error: String(error) });
      throw error;
    }
  }

  /**
   * Logout user. The caller is logged out locally even if the store call fails.
   */
  logout(identity: ProcessLocalIdentity, channel: RequestChannel): boolean {
    const sessionId = identity.sessionId;

    try {
      const deleted = sessionId ? this.sessions.delete(sessionId) : false;

      authMetrics.increment(AUTH_METRICS.LOGOUT);
      authLogger.info('User logged out', {
        username: identity.profile?.username,
        sessionId: redactSessionId(sessionId),
        deleted,
      });

      return deleted;
    } finally {
      this.propagator.clearCookie(channel);
      identity.demote();
    }
  }

  /**
   * Delete every session of the current user, in every front end
   */
  logoutEverywhere(identity: ProcessLocalIdentity, channel: RequestChannel): number {
    const profile = identity.isAuthenticated ? identity.profile : null;
    if (!profile) {
      throw new AuthError('Authentication required', 'AUTH_REQUIRED', 401);
    }

    try {
      const count = this.sessions.deleteByUsername(profile.username);

      authMetrics.increment(AUTH_METRICS.LOGOUT_EVERYWHERE);
      authLogger.info('User logged out everywhere', { username: profile.username, count });

      return count;
    } finally {
      this.propagator.clearCookie(channel);
      identity.demote();
    }
  }

  /**
   * Register a new user. Does not log the user in.
   */
  async register(data: RegistrationData): Promise<RegistrationResult> {
    const role = this.validateRegistration(data);

    try {
      // Cheap checks first so a taken name never pays for a hash
      if (this.credentials.findByUsername(data.username)) {
        return this.registrationFailure(data, 'USERNAME_TAKEN');
      }
      if (this.credentials.emailExists(data.email)) {
        return this.registrationFailure(data, 'EMAIL_TAKEN');
      }

      const passwordHash = await this.passwords.hash(data.password);

      // Re-checked under the write lock; a sibling process may have won the race
      const result = this.credentials.insert({
        username: data.username,
        displayName: data.displayName.trim(),
        email: data.email.trim(),
        passwordHash,
        role,
        subscriptionTier: 'free',
        subscriptionStatus: 'inactive',
        createdAt: new Date(),
      });

      if (!result.ok) {
        return this.registrationFailure(data, result.reason);
      }

      authMetrics.increment(AUTH_METRICS.REGISTER_SUCCESS);
      authLogger.info('User registered', { username: data.username, role });

      return { success: true, username: data.username };
    } catch (error) {
      authMetrics.increment(AUTH_METRICS.REGISTER_FAILURE);
      authLogger.error('Registration error', { username: data.username, error: String(error) });
      throw error;
    }
  }

  isAuthenticated(identity: ProcessLocalIdentity): boolean {
    return identity.isAuthenticated;
  }

  currentUser(identity: ProcessLocalIdentity): UserProfile | null {
    return identity.isAuthenticated ? identity.profile : null;
  }

  hasAccess(identity: ProcessLocalIdentity, requiredLevel: string): boolean {
    const role = this.currentUser(identity)?.role ?? 'public';
    return roleHasAccess(role, requiredLevel);
  }

  embedInLink(identity: ProcessLocalIdentity, url: string): string {
    return this.propagator.embedInLink(url, identity.isAuthenticated ? identity.sessionId : null);
  }

  activeSessionCount(): number {
    return this.sessions.countActive();
  }

  // ==================== Private Helpers ====================

  private validateRegistration(data: RegistrationData): NonNullable<RegistrationData['role']> {
    if (!USERNAME_PATTERN.test(data.username)) {
      throw new AuthError('Username must be 2-64 letters, digits, dots, dashes or underscores', 'INVALID_USERNAME');
    }
    if (!data.password) {
      throw new AuthError('Password is required', 'INVALID_PASSWORD');
    }
    if (!EMAIL_PATTERN.test(data.email.trim())) {
      throw new AuthError('A valid email address is required', 'INVALID_EMAIL');
    }
    if (!data.displayName.trim()) {
      throw new AuthError('Display name is required', 'INVALID_DISPLAY_NAME');
    }

    const role = normalizeRole(data.role ?? 'user');
    if (!role) {
      throw new AuthError(`Unknown role: ${String(data.role)}`, 'INVALID_ROLE');
    }
    return role;
  }

  private registrationFailure(
    data: RegistrationData,
    reason: 'USERNAME_TAKEN' | 'EMAIL_TAKEN'
  ): RegistrationResult {
    authMetrics.increment(AUTH_METRICS.REGISTER_FAILURE);

    if (reason === 'USERNAME_TAKEN') {
      authLogger.warn('Registration failed: username taken', { username: data.username });
      return { success: false, reason, message: 'Username already exists' };
    }

    authLogger.warn('Registration failed: email taken', { email: data.email });
    return { success: false, reason, message: 'Email already registered' };
  }

  /**
   * Move a legacy (plain-text, bcrypt or weaker argon2) hash onto the current
   * argon2 parameters. Never fails the login it piggybacks on.
   */
  private async upgradePasswordHash(credential: UserCredential, password: string): Promise<void> {
    try {
      const passwordHash = await this.passwords.hash(password);
      if (this.credentials.updatePasswordHash(credential.username, passwordHash)) {
        authMetrics.increment(AUTH_METRICS.PASSWORD_REHASHED);
      }
    } catch (error) {
      authLogger.error('Password hash upgrade failed', {
        username: credential.username,
        error: String(error),
      });
    }
  }
}
