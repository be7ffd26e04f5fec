import { ROLES, Role } from '@/constants/banking';

/**
 * Authenticated principal attached to a request
 */
export interface AuthContext {
  userId: number;
  username: string;
  role: Role;
  isActive: boolean;
  sessionId: number;
}

const ROLE_RANK: Record<Role, number> = {
  [ROLES.STANDARD]: 1,
  [ROLES.ADMIN]: 2,
};

function isRole(value: unknown): value is Role {
  return value === ROLES.STANDARD || value === ROLES.ADMIN;
}

/**
 * Authorization Guard
 *
 * Fails closed: a missing principal, an inactive user or a role value outside
 * the enumeration never satisfies a check.
 */
export function requireRole(auth: AuthContext | null | undefined, role: Role): boolean {
  if (!auth || !auth.isActive || !isRole(auth.role) || !isRole(role)) {
    return false;
  }
  return ROLE_RANK[auth.role] >= ROLE_RANK[role];
}

/**
 * Verified administrators bypass both rate-limit tiers
 */
export function isRateLimitExempt(auth: AuthContext | null | undefined): boolean {
  return requireRole(auth, ROLES.ADMIN);
}
