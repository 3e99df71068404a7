// Migration Script: Replace plain-text passwords in the credential file with argon2 hashes
// Usage: tsx scripts/migrate-legacy-passwords.ts [--dry-run]

import 'dotenv/config';
import { buildAppConfig } from '../src/utils/config.js';
import { createAuthRuntime } from '../src/infrastructure/AuthRuntime.js';
import { PasswordVerifier } from '../src/application/auth/PasswordVerifier.js';
import { migrateLegacyPasswords } from '../src/application/auth/migrateLegacyPasswords.js';

async function main(): Promise<void> {
  const dryRun = process.argv.includes('--dry-run');
  const config = buildAppConfig(process.env);

  console.log(`Migrating ${config.credentials.path}${dryRun ? ' (dry run)' : ''}...`);

  // The runtime supplies the registry together with the cross-process write lock
  const runtime = createAuthRuntime(config);
  try {
    const report = await migrateLegacyPasswords(
      runtime.credentials,
      new PasswordVerifier({ ...config.passwordHash, allowPlaintext: true }),
      { dryRun }
    );

    console.log(`Scanned: ${report.scanned}`);
    console.log(`Migrated: ${report.migrated.length}`);
    report.migrated.forEach((username) => console.log(`  - ${username}`));
    console.log(`Already hashed: ${report.skipped}`);
  } finally {
    runtime.close();
  }
}

main().catch((error) => {
  console.error('Migration failed:', error);
  process.exit(1);
});
