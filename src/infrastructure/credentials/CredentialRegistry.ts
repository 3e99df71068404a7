// Credential Registry - LowDB implementation
// username -> credential map kept in one JSON file, read and rewritten wholesale

import { LowSync } from 'lowdb';
import { JSONFileSync } from 'lowdb/node';
import { statSync } from 'fs';
import { z } from 'zod';
import type { UserCredential, InsertResult } from '@/domain/user/types.js';
import { parseSubscriptionStatus, parseSubscriptionTier } from '@/domain/user/types.js';
import type { ICredentialRegistry, ICredentialWriteLock } from '@/domain/user/repository.js';
import { normalizeRole } from '@/domain/user/roles.js';
import { StoreUnavailableError } from '@/utils/errors.js';
import { credentialsLogger } from '@/utils/auth-logger.js';

// File layout, one entry per username
const CredentialEntrySchema = z
  .object({
    name: z.string().optional(),
    email: z.string().optional(),
    password: z.string(),
    role: z.string().optional(),
    subscription_tier: z.string().optional(),
    subscription_status: z.string().optional(),
    created_at: z.string().optional(),
  })
  .passthrough();

const CredentialFileSchema = z
  .object({
    credentials: z
      .object({
        usernames: z.record(CredentialEntrySchema).default({}),
      })
      .passthrough()
      .default({ usernames: {} }),
  })
  .passthrough();

export type CredentialEntry = z.infer<typeof CredentialEntrySchema>;
export type CredentialFile = z.infer<typeof CredentialFileSchema>;

export interface CredentialRegistryConfig {
  path: string;
}

function emptyFile(): CredentialFile {
  return { credentials: { usernames: {} } };
}

export class CredentialRegistry implements ICredentialRegistry {
  private db: LowSync<CredentialFile>;
  private fileStamp: string | null = null;

  constructor(
    private config: CredentialRegistryConfig,
    private writeLock: ICredentialWriteLock
  ) {
    this.db = new LowSync<CredentialFile>(new JSONFileSync<CredentialFile>(config.path), emptyFile());
  }

  /**
   * Whole-file read at process start
   */
  init(): void {
    this.reload();
    credentialsLogger.info('Credential file loaded', {
      path: this.config.path,
      users: this.count(),
    });
  }

  findByUsername(username: string): UserCredential | null {
    this.reloadIfChanged();
    const entry = this.entry(username);
    return entry ? this.entryToCredential(username, entry) : null;
  }

  emailExists(email: string): boolean {
    this.reloadIfChanged();
    return this.hasEmail(email);
  }

  /**
   * Add a credential. Both uniqueness checks run against a fresh read of the
   * file while holding the cross-process write lock; the file is rewritten only
   * after both pass. A failed write is rolled back in memory.
   */
  insert(credential: UserCredential): InsertResult {
    return this.writeLock.withLock<InsertResult>(() => {
      this.reload();

      if (this.entry(credential.username)) {
        credentialsLogger.warn('Insert rejected: username taken', { username: credential.username });
        return { ok: false, reason: 'USERNAME_TAKEN' };
      }

      if (this.hasEmail(credential.email)) {
        credentialsLogger.warn('Insert rejected: email taken', { email: credential.email });
        return { ok: false, reason: 'EMAIL_TAKEN' };
      }

      const usernames = this.entries();
      usernames[credential.username] = this.credentialToEntry(credential);

      try {
        this.persist();
      } catch (error) {
        delete usernames[credential.username];
        throw error;
      }

      credentialsLogger.info('Credential added', {
        username: credential.username,
        role: credential.role,
      });
      return { ok: true };
    });
  }

  /**
   * Replace a stored password hash (legacy hash upgrade)
   */
  updatePasswordHash(username: string, passwordHash: string): boolean {
    return this.writeLock.withLock<boolean>(() => {
      this.reload();

      const entry = this.entry(username);
      if (!entry) return false;

      const previous = entry.password;
      entry.password = passwordHash;

      try {
        this.persist();
      } catch (error) {
        entry.password = previous;
        throw error;
      }

      credentialsLogger.info('Password hash upgraded', { username });
      return true;
    });
  }

  count(): number {
    return Object.keys(this.entries()).length;
  }

  listUsernames(): string[] {
    this.reloadIfChanged();
    return Object.keys(this.entries());
  }

  private entries(): Record<string, CredentialEntry> {
    return this.db.data.credentials.usernames;
  }

  private entry(username: string): CredentialEntry | undefined {
    const usernames = this.entries();
    return Object.hasOwn(usernames, username) ? usernames[username] : undefined;
  }

  private hasEmail(email: string): boolean {
    const wanted = email.trim().toLowerCase();
    return Object.values(this.entries()).some(
      (entry) => entry.email !== undefined && entry.email.trim().toLowerCase() === wanted
    );
  }

  /**
   * Another process may have rewritten the file since we last read it
   */
  private reloadIfChanged(): void {
    if (this.currentStamp() !== this.fileStamp) {
      this.reload();
    }
  }

  private currentStamp(): string | null {
    const stats = statSync(this.config.path, { throwIfNoEntry: false });
    return stats ? `${stats.mtimeMs}:${stats.size}` : null;
  }

  private reload(): void {
    try {
      this.db.read();
    } catch (error) {
      credentialsLogger.error('Failed to read credential file', {
        path: this.config.path,
        error: String(error),
      });
      throw new StoreUnavailableError('Credential file could not be read', {
        path: this.config.path,
        cause: String(error),
      });
    }

    const parsed = CredentialFileSchema.safeParse(this.db.data ?? emptyFile());
    if (!parsed.success) {
      credentialsLogger.error('Credential file is malformed', {
        path: this.config.path,
        issues: parsed.error.issues.length,
      });
      throw new StoreUnavailableError('Credential file is malformed', {
        path: this.config.path,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    this.db.data = parsed.data;
    this.fileStamp = this.currentStamp();
  }

  private persist(): void {
    try {
      this.db.write();
      this.fileStamp = this.currentStamp();
    } catch (error) {
      credentialsLogger.error('Failed to write credential file', {
        path: this.config.path,
        error: String(error),
      });
      throw new StoreUnavailableError('Credential file could not be written', {
        path: this.config.path,
        cause: String(error),
      });
    }
  }

  private entryToCredential(username: string, entry: CredentialEntry): UserCredential {
    const role = entry.role === undefined ? 'user' : normalizeRole(entry.role) ?? 'public';

    return {
      username,
      displayName: entry.name ?? username,
      email: entry.email ?? '',
      passwordHash: entry.password,
      role,
      subscriptionTier: parseSubscriptionTier(entry.subscription_tier),
      subscriptionStatus: parseSubscriptionStatus(entry.subscription_status),
      createdAt: entry.created_at ? new Date(entry.created_at) : new Date(0),
    };
  }

  private credentialToEntry(credential: UserCredential): CredentialEntry {
    return {
      name: credential.displayName,
      email: credential.email,
      password: credential.passwordHash,
      role: credential.role,
      subscription_tier: credential.subscriptionTier,
      subscription_status: credential.subscriptionStatus,
      created_at: credential.createdAt.toISOString(),
    };
  }
}
