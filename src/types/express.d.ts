// Type declarations for Express Request augmentation
import type { RequestAuth } from '@/application/auth/RequestAuth.js';

declare global {
  namespace Express {
    interface Request {
      auth?: RequestAuth;
    }
  }
}

export {};
