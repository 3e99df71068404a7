// API Middleware: Authentication Module
// Resolves the caller's identity on every request and gates routes by role

import type { Request, Response, NextFunction } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { createError } from './errorHandler.js';
import { ExpressRequestChannel } from './ExpressRequestChannel.js';
import type { AuthService } from '@/application/auth/AuthService.js';
import type { RequestAuth } from '@/application/auth/RequestAuth.js';
import type { IdentityCache } from '@/infrastructure/cache/IdentityCache.js';

export interface AuthModuleOptions {
  clientCookieName: string;
  secureCookies: boolean;
}

const CLIENT_ID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Authentication Module - per-request identity plus route guards
 */
export class AuthModule {
  constructor(
    readonly authService: AuthService,
    private readonly identities: IdentityCache,
    private readonly options: AuthModuleOptions = {
      clientCookieName: 'sso_client',
      secureCookies: false,
    }
  ) {}

  /**
   * Client key for the per-process identity cache. A bearer secret like the
   * session cookie: whoever presents it gets the identity cached under it,
   * session included, until the store says that session is gone.
   */
  private clientIdFor(req: Request, res: Response): string {
    const cookies: Record<string, unknown> = req.cookies ?? {};
    const existing = cookies[this.options.clientCookieName];
    if (typeof existing === 'string' && CLIENT_ID_PATTERN.test(existing)) {
      return existing;
    }

    const clientId = uuidv4();
    // Browser-session cookie: a fresh tab group starts unresolved
    res.cookie(this.options.clientCookieName, clientId, {
      httpOnly: true,
      secure: this.options.secureCookies,
      sameSite: 'lax',
      path: '/',
    });
    return clientId;
  }

  // ==================== Middleware ====================

  /**
   * Run identity resolution before any handler. A link hand-over on a GET is
   * answered with a redirect to the same URL without the token.
   */
  resolveIdentity = (req: Request, res: Response, next: NextFunction): void => {
    try {
      const identity = this.identities.acquire(this.clientIdFor(req, res));
      const channel = new ExpressRequestChannel(req, res, {
        secureCookies: this.options.secureCookies,
      });

      req.auth = this.authService.bind(identity, channel);
      req.auth.resolve();

      const cleaned = channel.strippedUrl;
      if (cleaned !== null && (req.method === 'GET' || req.method === 'HEAD')) {
        res.redirect(302, cleaned);
        return;
      }

      next();
    } catch (error) {
      next(error);
    }
  };

  requireAuth = (req: Request, _res: Response, next: NextFunction): void => {
    if (!req.auth?.isAuthenticated()) {
      next(createError('Authentication required', 401, 'AUTH_REQUIRED'));
      return;
    }
    next();
  };

  /**
   * Must be used AFTER resolveIdentity
   */
  requireRole(level: string) {
    return (req: Request, _res: Response, next: NextFunction): void => {
      const auth = req.auth;
      if (auth?.hasAccess(level)) {
        next();
        return;
      }

      if (!auth?.isAuthenticated()) {
        next(createError('Authentication required', 401, 'AUTH_REQUIRED'));
        return;
      }

      next(createError(`Requires ${level} access`, 403, 'FORBIDDEN'));
    };
  }
}

/**
 * Request-scoped auth handle set by resolveIdentity
 */
export function requestAuth(req: Request): RequestAuth {
  if (!req.auth) {
    throw createError('Identity was not resolved for this request', 500, 'IDENTITY_NOT_RESOLVED');
  }
  return req.auth;
}

export function createAuthModule(
  authService: AuthService,
  identities: IdentityCache,
  options?: AuthModuleOptions
): AuthModule {
  return new AuthModule(authService, identities, options);
}
