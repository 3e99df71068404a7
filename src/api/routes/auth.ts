// API layer: Authentication routes
// Login, logout, registration and identity queries for one front end

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { asyncHandler } from '@/api/middleware/errorHandler.js';
import { createRateLimitMiddleware, RateLimitPresets } from '@/api/middleware/rateLimiter.js';
import { requestAuth, type AuthModule } from '@/api/middleware/AuthModule.js';
import { normalizeRole } from '@/domain/user/roles.js';
import type { Role } from '@/domain/user/types.js';
import { AuthError } from '@/utils/errors.js';

// Request schemas
const LoginSchema = z.object({
  username: z.string().min(1),
  password: z.string().min(1),
});

const RegisterSchema = z.object({
  username: z.string().min(1).max(64),
  password: z.string().min(1),
  email: z.string().email(),
  displayName: z.string().min(1).max(100),
  role: z.string().optional(),
});

const LinkQuerySchema = z.object({
  url: z.string().min(1),
});

// Elevated roles are granted out of band, never through sign-up
const SELF_SERVICE_ROLES: ReadonlySet<Role> = new Set<Role>(['user', 'subscriber']);

function selfServiceRole(requested: string | undefined): Role {
  if (requested === undefined) return 'user';

  const role = normalizeRole(requested);
  if (!role || !SELF_SERVICE_ROLES.has(role)) {
    throw new AuthError(`Role "${requested}" cannot be requested at registration`, 'ROLE_NOT_ALLOWED');
  }
  return role;
}

export function createAuthRouter(authModule: AuthModule): Router {
  const router = Router();

  /**
   * POST /auth/login
   */
  router.post(
    '/login',
    createRateLimitMiddleware(RateLimitPresets.login),
    asyncHandler(async (req: Request, res: Response) => {
      const { username, password } = LoginSchema.parse(req.body);
      const auth = requestAuth(req);

      const result = await auth.login(username, password);
      if (!result.success) {
        res.status(401).json({ success: false, code: 'INVALID_CREDENTIALS', message: result.message });
        return;
      }

      res.json({ success: true, message: result.message, user: auth.currentUser() });
    })
  );

  /**
   * POST /auth/logout
   */
  router.post('/logout', (req: Request, res: Response) => {
    requestAuth(req).logout();
    res.json({ success: true, message: 'Logged out successfully' });
  });

  /**
   * POST /auth/logout-all
   * Sign out of every front end (requires authentication)
   */
  router.post('/logout-all', authModule.requireAuth, (req: Request, res: Response) => {
    const count = requestAuth(req).logoutEverywhere();
    res.json({ success: true, count });
  });

  /**
   * POST /auth/register
   */
  router.post(
    '/register',
    createRateLimitMiddleware(RateLimitPresets.register),
    asyncHandler(async (req: Request, res: Response) => {
      const data = RegisterSchema.parse(req.body);
      const role = selfServiceRole(data.role);

      const result = await requestAuth(req).register({ ...data, role });
      if (!result.success) {
        res.status(409).json({ success: false, code: result.reason, message: result.message });
        return;
      }

      res.status(201).json({ success: true, username: result.username });
    })
  );

  /**
   * GET /auth/me
   */
  router.get('/me', (req: Request, res: Response) => {
    const auth = requestAuth(req);
    res.json({
      success: true,
      authenticated: auth.isAuthenticated(),
      user: auth.currentUser(),
    });
  });

  /**
   * GET /auth/link?url=
   * Outbound link to a sibling front end, carrying the session when signed in
   */
  router.get('/link', (req: Request, res: Response) => {
    const { url } = LinkQuerySchema.parse(req.query);
    res.json({ success: true, url: requestAuth(req).embedInLink(url) });
  });

  /**
   * GET /auth/access/:level
   */
  router.get('/access/:level', (req: Request, res: Response) => {
    const level = req.params.level;
    res.json({ success: true, level, allowed: requestAuth(req).hasAccess(level) });
  });

  return router;
}
