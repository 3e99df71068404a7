// Domain: Entitlement gate
// Ordinal role ranking shared by every front end

import { ROLES, type Role } from './types.js';

export const ROLE_LEVELS: Readonly<Record<Role, number>> = {
  public: 0,
  user: 1,
  subscriber: 2,
  admin: 3,
  superadmin: 4,
};

const ROLE_ALIASES: Readonly<Record<string, Role>> = {
  anonymous: 'public',
  registered: 'user',
};

export const HIGHEST_LEVEL = ROLE_LEVELS.superadmin;

/**
 * Map a role string (including the legacy aliases) onto a known role
 */
export function normalizeRole(value: string | null | undefined): Role | null {
  if (!value) return null;
  const key = value.trim().toLowerCase();
  const alias = ROLE_ALIASES[key];
  if (alias) return alias;
  return ROLES.find((role) => role === key) ?? null;
}

/**
 * Unrecognized roles held by a user rank lowest
 */
export function rankOf(role: string | null | undefined): number {
  const known = normalizeRole(role);
  return known ? ROLE_LEVELS[known] : ROLE_LEVELS.public;
}

/**
 * Does a user holding `currentRole` meet a page's `requiredLevel`?
 *
 * `public` always passes. An unrecognized required level is treated as the
 * highest rank, so a typo in a page's gate locks the page instead of opening it.
 */
export function hasAccess(currentRole: string | null | undefined, requiredLevel: string): boolean {
  const required = normalizeRole(requiredLevel);
  if (required === 'public') return true;

  const requiredRank = required ? ROLE_LEVELS[required] : HIGHEST_LEVEL;
  return rankOf(currentRole) >= requiredRank;
}
