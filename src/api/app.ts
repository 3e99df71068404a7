// API layer: Express app configuration
// Composes all middleware and routes for one front end

import express, { type Application, type Request, type Response } from 'express';
import cookieParser from 'cookie-parser';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { errorHandler } from './middleware/errorHandler.js';
import type { AuthModule } from './middleware/AuthModule.js';
import { createAuthRouter } from './routes/auth.js';
import { createAdminRouter } from './routes/admin.js';
import { authLogger } from '@/utils/auth-logger.js';

export interface AppOptions {
  authModule: AuthModule;
  appName: string;
  corsOrigins: string[];
  trustProxy: boolean;
  logFormat: string | null;   // null disables the access log
}

export function createApp(options: Pick<AppOptions, 'authModule'> & Partial<AppOptions>): Application {
  const app = express();

  const {
    authModule,
    appName = 'shared-auth',
    corsOrigins = ['http://localhost:3000', 'http://127.0.0.1:3000'],
    trustProxy = false,
    logFormat = process.env.NODE_ENV === 'production' ? 'combined' : 'dev',
  } = options;

  // Trust proxy (for proper client IP behind reverse proxy)
  if (trustProxy) {
    app.set('trust proxy', 1);
  }

  // Security middleware
  app.use(helmet({
    contentSecurityPolicy: false, // Disable for API-only server
  }));

  // Sibling front ends call each other with credentials (cookies)
  app.use(cors({
    origin: corsOrigins,
    credentials: true,
  }));

  if (logFormat) {
    app.use(morgan(logFormat));
  }

  app.use(express.json({ limit: '100kb' }));
  app.use(express.urlencoded({ extended: true, limit: '100kb' }));
  app.use(cookieParser());

  // Health check answers even while identity resolution is failing
  app.get('/health', (_req: Request, res: Response) => {
    let activeSessions: number | null = null;
    let status = 'ok';
    try {
      activeSessions = authModule.authService.activeSessionCount();
    } catch (error) {
      status = 'degraded';
      authLogger.error('Health check could not reach the session store', { error: String(error) });
    }

    res.status(status === 'ok' ? 200 : 503).json({
      status,
      app: appName,
      activeSessions,
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  });

  // Every request below runs the session discovery chain first
  app.use(authModule.resolveIdentity);

  app.use('/auth', createAuthRouter(authModule));
  app.use('/admin', createAdminRouter(authModule));

  // 404 handler
  app.use((_req: Request, res: Response) => {
    res.status(404).json({
      success: false,
      error: {
        code: 'NOT_FOUND',
        message: 'Resource not found',
      },
    });
  });

  // Global error handler (must be last)
  app.use(errorHandler);

  return app;
}
