import { AuthContext, isRateLimitExempt, requireRole } from '@/services/authorization.service';
import { ROLES } from '@/constants/banking';

const standard: AuthContext = { userId: 1, username: 'alice', role: ROLES.STANDARD, isActive: true, sessionId: 1 };
const admin: AuthContext = { userId: 2, username: 'root', role: ROLES.ADMIN, isActive: true, sessionId: 2 };

describe('requireRole', () => {
  it('should grant roles at or below the principal', () => {
    expect(requireRole(standard, ROLES.STANDARD)).toBe(true);
    expect(requireRole(admin, ROLES.STANDARD)).toBe(true);
    expect(requireRole(admin, ROLES.ADMIN)).toBe(true);
  });

  it('should deny roles above the principal', () => {
    expect(requireRole(standard, ROLES.ADMIN)).toBe(false);
  });

  it('should fail closed for missing or inactive principals', () => {
    expect(requireRole(null, ROLES.STANDARD)).toBe(false);
    expect(requireRole(undefined, ROLES.STANDARD)).toBe(false);
    expect(requireRole({ ...admin, isActive: false }, ROLES.ADMIN)).toBe(false);
  });
});

describe('isRateLimitExempt', () => {
  it('should exempt only active administrators', () => {
    expect(isRateLimitExempt(admin)).toBe(true);
    expect(isRateLimitExempt(standard)).toBe(false);
    expect(isRateLimitExempt({ ...admin, isActive: false })).toBe(false);
    expect(isRateLimitExempt(null)).toBe(false);
  });
});
