// Application: Legacy password migration
// Re-hashes plain-text credential entries with argon2 in one pass

import type { ICredentialRegistry } from '@/domain/user/repository.js';
import { detectScheme, type PasswordVerifier } from './PasswordVerifier.js';
import { credentialsLogger } from '@/utils/auth-logger.js';

export interface MigrationReport {
  scanned: number;
  migrated: string[];
  skipped: number;          // Already argon2 or bcrypt; those upgrade on next login
}

/**
 * bcrypt entries cannot be converted without the password, so only plain
 * text is touched here. With `dryRun` nothing is written.
 */
export async function migrateLegacyPasswords(
  registry: ICredentialRegistry,
  passwords: PasswordVerifier,
  options: { dryRun?: boolean } = {}
): Promise<MigrationReport> {
  const report: MigrationReport = { scanned: 0, migrated: [], skipped: 0 };

  for (const username of registry.listUsernames()) {
    const credential = registry.findByUsername(username);
    if (!credential) continue;
    report.scanned++;

    if (detectScheme(credential.passwordHash) !== 'plaintext') {
      report.skipped++;
      continue;
    }

    if (!options.dryRun) {
      const passwordHash = await passwords.hash(credential.passwordHash);
      registry.updatePasswordHash(username, passwordHash);
    }
    report.migrated.push(username);
  }

  credentialsLogger.info('Legacy password migration finished', {
    scanned: report.scanned,
    migrated: report.migrated.length,
    skipped: report.skipped,
    dryRun: options.dryRun ?? false,
  });

  return report;
}
