// Domain: User types
// Pure TypeScript interfaces for credentials, sessions and identities

export const ROLES = ['public', 'user', 'subscriber', 'admin', 'superadmin'] as const;
export type Role = (typeof ROLES)[number];

export const SUBSCRIPTION_TIERS = ['free', 'pro', 'enterprise'] as const;
export type SubscriptionTier = (typeof SUBSCRIPTION_TIERS)[number];

export const SUBSCRIPTION_STATUSES = ['active', 'inactive'] as const;
export type SubscriptionStatus = (typeof SUBSCRIPTION_STATUSES)[number];

/**
 * One registered human, as held by the credential file
 */
export interface UserCredential {
  username: string;              // Unique key, immutable once created
  displayName: string;
  email: string;                 // Unique across all credentials
  passwordHash: string;          // argon2 PHC string (bcrypt or plain text for legacy entries)
  role: Role;
  subscriptionTier: SubscriptionTier;
  subscriptionStatus: SubscriptionStatus;
  createdAt: Date;
}

/**
 * The part of a credential copied into every session at creation time
 */
export interface UserProfile {
  username: string;
  displayName: string;
  email: string;
  role: Role;
  subscriptionTier: SubscriptionTier;
  subscriptionStatus: SubscriptionStatus;
}

/**
 * Row of the shared session table
 */
export interface SessionRecord extends UserProfile {
  sessionId: string;
  createdAt: Date;
  lastAccessedAt: Date;
  expiresAt: Date;
}

/**
 * Registration data
 */
export interface RegistrationData {
  username: string;
  password: string;
  email: string;
  displayName: string;
  role?: Role;
}

export type RegistrationFailureReason = 'USERNAME_TAKEN' | 'EMAIL_TAKEN';

export type InsertResult =
  | { ok: true }
  | { ok: false; reason: RegistrationFailureReason };

export type RegistrationResult =
  | { success: true; username: string }
  | { success: false; reason: RegistrationFailureReason; message: string };

export interface LoginResult {
  success: boolean;
  message: string;
}

/**
 * Strip a credential or session row down to the shareable profile fields
 */
export function toProfile(source: UserProfile): UserProfile {
  return {
    username: source.username,
    displayName: source.displayName,
    email: source.email,
    role: source.role,
    subscriptionTier: source.subscriptionTier,
    subscriptionStatus: source.subscriptionStatus,
  };
}

export function parseSubscriptionTier(value: unknown): SubscriptionTier {
  return SUBSCRIPTION_TIERS.find((tier) => tier === value) ?? 'free';
}

export function parseSubscriptionStatus(value: unknown): SubscriptionStatus {
  return SUBSCRIPTION_STATUSES.find((status) => status === value) ?? 'inactive';
}
