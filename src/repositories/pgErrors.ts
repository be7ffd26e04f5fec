/**
 * PostgreSQL unique_violation (SQLSTATE 23505)
 */
export function isUniqueViolation(error: unknown): error is { code: string; constraint?: string } {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === '23505';
}
