// Application: Password Verifier
// argon2id for new hashes; bcrypt and plain text accepted for legacy credentials

import * as argon2 from 'argon2';
import bcrypt from 'bcryptjs';
import { authLogger, authMetrics, AUTH_METRICS } from '@/utils/auth-logger.js';

export interface PasswordVerifierConfig {
  memoryCost: number;              // KiB
  timeCost: number;
  parallelism: number;
  allowPlaintext: boolean;         // Legacy fallback; switch off once no plain-text entries remain
}

export type PasswordScheme = 'argon2' | 'bcrypt' | 'plaintext';

export interface VerificationResult {
  valid: boolean;
  scheme: PasswordScheme;
  needsRehash: boolean;
}

const ARGON2_PREFIX = '$argon2';
const BCRYPT_PATTERN = /^\$2[aby]\$\d{2}\$/;

export function detectScheme(stored: string): PasswordScheme {
  if (stored.startsWith(ARGON2_PREFIX)) return 'argon2';
  if (BCRYPT_PATTERN.test(stored)) return 'bcrypt';
  return 'plaintext';
}

export class PasswordVerifier {
  constructor(
    private config: PasswordVerifierConfig = {
      memoryCost: 19456,
      timeCost: 2,
      parallelism: 1,
      allowPlaintext: true,
    }
  ) {}

  /**
   * Hash with argon2id; the random salt is embedded in the returned string
   */
  async hash(plaintext: string): Promise<string> {
    return argon2.hash(plaintext, {
      type: argon2.argon2id,
      memoryCost: this.config.memoryCost,
      timeCost: this.config.timeCost,
      parallelism: this.config.parallelism,
    });
  }

  async verify(plaintext: string, stored: string, username?: string): Promise<VerificationResult> {
    const scheme = detectScheme(stored);

    switch (scheme) {
      case 'argon2': {
        const valid = await this.verifyArgon2(plaintext, stored, username);
        return {
          valid,
          scheme,
          needsRehash: valid && argon2.needsRehash(stored, {
            memoryCost: this.config.memoryCost,
            timeCost: this.config.timeCost,
          }),
        };
      }

      case 'bcrypt': {
        const valid = await this.verifyBcrypt(plaintext, stored, username);
        return { valid, scheme, needsRehash: valid };
      }

      case 'plaintext': {
        authMetrics.increment(AUTH_METRICS.PASSWORD_LEGACY_PLAINTEXT);
        if (!this.config.allowPlaintext) {
          authLogger.warn('Plain-text stored password rejected; fallback is disabled', { username });
          return { valid: false, scheme, needsRehash: false };
        }

        authLogger.warn('Legacy plain-text password comparison used; credential needs migration', {
          username,
        });
        const valid = plaintext.length > 0 && plaintext === stored;
        return { valid, scheme, needsRehash: valid };
      }
    }
  }

  private async verifyArgon2(plaintext: string, stored: string, username?: string): Promise<boolean> {
    try {
      return await argon2.verify(stored, plaintext);
    } catch (error) {
      // Malformed hash in the file counts as a mismatch
      authLogger.error('Stored argon2 hash could not be verified', {
        username,
        error: String(error),
      });
      return false;
    }
  }

  private async verifyBcrypt(plaintext: string, stored: string, username?: string): Promise<boolean> {
    try {
      return await bcrypt.compare(plaintext, stored);
    } catch (error) {
      // Bad rounds or salt in a legacy hash count as a mismatch
      authLogger.error('Stored bcrypt hash could not be verified', {
        username,
        error: String(error),
      });
      return false;
    }
  }
}
