import { describe, it, expect } from 'vitest';
import { HIGHEST_LEVEL, hasAccess, normalizeRole, rankOf, ROLE_LEVELS } from '@/domain/user/roles.js';
import { ROLES } from '@/domain/user/types.js';

describe('normalizeRole', () => {
  it('maps the legacy aliases', () => {
    expect(normalizeRole('anonymous')).toBe('public');
    expect(normalizeRole('registered')).toBe('user');
  });

  it('ignores case and surrounding whitespace', () => {
    expect(normalizeRole('  Admin ')).toBe('admin');
  });

  it('returns null for unknown or empty values', () => {
    expect(normalizeRole('owner')).toBeNull();
    expect(normalizeRole('')).toBeNull();
    expect(normalizeRole(undefined)).toBeNull();
  });
});

describe('rankOf', () => {
  it('ranks unknown current roles lowest', () => {
    expect(rankOf('owner')).toBe(0);
    expect(rankOf(null)).toBe(0);
  });

  it('ranks aliases like the roles they stand for', () => {
    expect(rankOf('registered')).toBe(ROLE_LEVELS.user);
  });
});

describe('hasAccess', () => {
  it('grants subscriber pages to admins but not to users', () => {
    expect(hasAccess('admin', 'subscriber')).toBe(true);
    expect(hasAccess('user', 'subscriber')).toBe(false);
  });

  it('always grants public', () => {
    expect(hasAccess('public', 'public')).toBe(true);
    expect(hasAccess('something-odd', 'public')).toBe(true);
    expect(hasAccess(null, 'anonymous')).toBe(true);
  });

  it('treats an unknown required level as the highest rank', () => {
    expect(hasAccess('admin', 'vip')).toBe(false);
    expect(hasAccess('superadmin', 'vip')).toBe(true);
  });

  it('accepts the registered alias as a required level', () => {
    expect(hasAccess('user', 'registered')).toBe(true);
    expect(hasAccess('public', 'registered')).toBe(false);
  });

  it('is monotone in the held role', () => {
    for (const required of ROLES) {
      for (const lower of ROLES) {
        for (const higher of ROLES) {
          if (ROLE_LEVELS[higher] >= ROLE_LEVELS[lower] && hasAccess(lower, required)) {
            expect(hasAccess(higher, required)).toBe(true);
          }
        }
      }
    }
  });

  it('is monotone in the required level', () => {
    const levels = [...ROLES, 'anonymous', 'registered', 'vip'];
    const held = [...ROLES, 'anonymous', 'registered', 'owner', null];
    const requiredRank = (level: string): number => {
      const known = normalizeRole(level);
      return known ? ROLE_LEVELS[known] : HIGHEST_LEVEL;
    };

    let pairs = 0;
    for (const role of held) {
      for (const lower of levels) {
        for (const higher of levels) {
          if (requiredRank(lower) > requiredRank(higher)) continue;
          pairs++;
          if (hasAccess(role, higher)) {
            expect(hasAccess(role, lower)).toBe(true);
          }
        }
      }
    }
    expect(pairs).toBeGreaterThan(0);
  });
});
