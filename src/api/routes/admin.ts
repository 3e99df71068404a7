// API layer: Admin routes
// Operational view of the shared session store (admin role and above)

import { Router, type Request, type Response } from 'express';
import type { AuthModule } from '@/api/middleware/AuthModule.js';
import { authMetrics } from '@/utils/auth-logger.js';

export function createAdminRouter(authModule: AuthModule): Router {
  const router = Router();

  router.use(authModule.requireRole('admin'));

  /**
   * GET /admin/stats
   */
  router.get('/stats', (_req: Request, res: Response) => {
    res.json({
      success: true,
      activeSessions: authModule.authService.activeSessionCount(),
      metrics: authMetrics.getAll(),
    });
  });

  return router;
}
