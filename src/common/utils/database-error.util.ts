const UNIQUE_VIOLATION = '23505';

/**
 * True for a Postgres unique-constraint violation surfaced by the driver,
 * optionally only for the named constraint.
 */
export function isUniqueViolation(error: unknown, constraint?: string): boolean {
  if (typeof error !== 'object' || error === null || !('code' in error) || error.code !== UNIQUE_VIOLATION) {
    return false;
  }
  return constraint === undefined || ('constraint' in error && error.constraint === constraint);
}
