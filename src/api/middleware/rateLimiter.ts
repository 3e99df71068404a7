// API Middleware: Rate Limiter
// Sliding window rate limiting middleware for Express
// Protects the credential endpoints from guessing and sign-up floods

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { authLogger } from '@/utils/auth-logger.js';

export interface RateLimitConfig {
  windowMs: number;              // Time window in milliseconds
  maxAttempts: number;           // Max requests per window
  keyGenerator: (req: Request) => string;  // Function to generate unique key
  skipSuccessfulRequests?: boolean;  // Don't count successful requests
}

interface RateLimitEntry {
  count: number;
  resetAt: number;
  windowStart: number;
}

const CLEANUP_INTERVAL_MS = 60 * 60 * 1000; // 1 hour

/**
 * In-memory attempt counters for one limiter. Expired entries are dropped
 * lazily, at most once per cleanup interval.
 */
export class RateLimitStore {
  private entries = new Map<string, RateLimitEntry>();
  private lastCleanup = Date.now();

  get(key: string): RateLimitEntry | undefined {
    return this.entries.get(key);
  }

  set(key: string, entry: RateLimitEntry): void {
    this.entries.set(key, entry);
  }

  get size(): number {
    return this.entries.size;
  }

  cleanup(now = Date.now()): number {
    let cleaned = 0;
    for (const [key, entry] of this.entries) {
      if (entry.resetAt < now) {
        this.entries.delete(key);
        cleaned++;
      }
    }
    this.lastCleanup = now;

    if (cleaned > 0) {
      authLogger.debug('Cleaned up expired rate limit entries', { count: cleaned });
    }
    return cleaned;
  }

  maybeCleanup(now: number): void {
    if (now - this.lastCleanup >= CLEANUP_INTERVAL_MS) {
      this.cleanup(now);
    }
  }
}

/**
 * Create rate limiting middleware
 */
export function createRateLimitMiddleware(
  config: RateLimitConfig,
  store: RateLimitStore = new RateLimitStore()
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const key = config.keyGenerator(req);
    const now = Date.now();
    store.maybeCleanup(now);

    let entry = store.get(key);

    if (!entry || now > entry.resetAt) {
      entry = {
        count: 1,
        resetAt: now + config.windowMs,
        windowStart: now,
      };
      store.set(key, entry);
    } else {
      // Sliding window: decay count based on time elapsed
      const windowElapsed = now - entry.windowStart;
      const decay = Math.floor((windowElapsed / config.windowMs) * entry.count);
      entry.count = Math.max(1, entry.count - decay);
      entry.windowStart = now - (windowElapsed % config.windowMs);
      entry.count++;
    }

    const remaining = Math.max(0, config.maxAttempts - entry.count);
    const retryAfter = Math.ceil((entry.resetAt - now) / 1000);

    res.setHeader('X-RateLimit-Limit', config.maxAttempts);
    res.setHeader('X-RateLimit-Remaining', remaining);
    res.setHeader('X-RateLimit-Reset', Math.ceil(entry.resetAt / 1000));

    if (entry.count > config.maxAttempts) {
      authLogger.warn('Rate limit exceeded', { key });
      res.setHeader('Retry-After', retryAfter);
      res.status(429).json({
        success: false,
        error: {
          code: 'RATE_LIMITED',
          message: 'Rate limit exceeded. Please try again later.',
        },
        retryAfter,
      });
      return;
    }

    if (config.skipSuccessfulRequests) {
      const counted = entry;
      res.on('finish', () => {
        if (res.statusCode >= 200 && res.statusCode < 300) {
          counted.count = Math.max(0, counted.count - 1);
        }
      });
    }

    next();
  };
}

function bodyField(req: Request, field: string): string {
  const body: unknown = req.body;
  if (typeof body === 'object' && body !== null && field in body) {
    const value: unknown = Reflect.get(body, field);
    if (typeof value === 'string') return value;
  }
  return 'unknown';
}

/**
 * Predefined rate limit configurations
 */
export const RateLimitPresets = {
  login: {
    windowMs: 15 * 60 * 1000,  // 15 minutes
    maxAttempts: 5,
    keyGenerator: (req: Request) => `login:${req.ip ?? 'unknown'}:${bodyField(req, 'username')}`,
    skipSuccessfulRequests: true,
  },

  register: {
    windowMs: 60 * 60 * 1000,  // 1 hour
    maxAttempts: 5,
    keyGenerator: (req: Request) => `register:${req.ip ?? 'unknown'}`,
    skipSuccessfulRequests: true,
  },
} satisfies Record<string, RateLimitConfig>;
