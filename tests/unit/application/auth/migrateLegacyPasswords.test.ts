import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'node:path';
import bcrypt from 'bcryptjs';
import { migrateLegacyPasswords } from '@/application/auth/migrateLegacyPasswords.js';
import {
  makeTempDir,
  readCredentialFile,
  removeTempDir,
  startProcess,
  writeCredentialFile,
  type TestProcess,
} from '../../../helpers/fixtures.js';

describe('migrateLegacyPasswords', () => {
  let dir: string;
  let path: string;
  let proc: TestProcess;
  const bcryptHash = bcrypt.hashSync('bob-pass', 4);

  beforeEach(() => {
    dir = makeTempDir();
    path = join(dir, 'credentials.json');
    writeCredentialFile(path, {
      alice: { email: 'alice@example.com', password: 'secret' },
      bob: { email: 'bob@example.com', password: bcryptHash },
    });
    proc = startProcess(dir);
  });

  afterEach(() => {
    proc.close();
    removeTempDir(dir);
  });

  it('hashes plain-text entries and leaves the rest alone', async () => {
    const report = await migrateLegacyPasswords(proc.credentials, proc.passwords);

    expect(report).toEqual({ scanned: 2, migrated: ['alice'], skipped: 1 });

    const usernames = readCredentialFile(path).credentials.usernames;
    expect(usernames.alice.password.startsWith('$argon2id$')).toBe(true);
    expect(usernames.bob.password).toBe(bcryptHash);
    expect((await proc.passwords.verify('secret', usernames.alice.password)).valid).toBe(true);
  });

  it('writes nothing on a dry run', async () => {
    const report = await migrateLegacyPasswords(proc.credentials, proc.passwords, { dryRun: true });

    expect(report.migrated).toEqual(['alice']);
    expect(readCredentialFile(path).credentials.usernames.alice.password).toBe('secret');
  });
});
