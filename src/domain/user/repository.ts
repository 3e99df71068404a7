// Domain: User repository interfaces
// Defines the contracts for credential and session persistence

import type {
  UserCredential,
  UserProfile,
  SessionRecord,
  InsertResult,
} from './types.js';

/**
 * Durable username -> credential store, backed by one structured text file
 * that is read and rewritten wholesale.
 */
export interface ICredentialRegistry {
  findByUsername(username: string): UserCredential | null;
  emailExists(email: string): boolean;
  insert(credential: UserCredential): InsertResult;
  updatePasswordHash(username: string, passwordHash: string): boolean;
  count(): number;
  listUsernames(): string[];
}

/**
 * Shared, multi-process session table. Every operation is one statement
 * against the datastore; none of them is a read-modify-write sequence.
 */
export interface ISessionStore {
  create(username: string, profile: UserProfile): SessionRecord;
  get(sessionId: string): SessionRecord | null;
  touch(sessionId: string): boolean;
  delete(sessionId: string): boolean;
  deleteByUsername(username: string): number;
  sweepExpired(): number;
  countActive(): number;
}

/**
 * Cross-process mutual exclusion for credential file writes
 */
export interface ICredentialWriteLock {
  withLock<T>(fn: () => T): T;
}
