// =============================================================================
// SEALED RATINGS — Role Definitions
// =============================================================================

/** All roles a bearer token may carry */
export type UserRole =
  | 'rater'
  | 'subject'
  | 'auditor'
  | 'admin';

export const USER_ROLES: readonly UserRole[] = ['rater', 'subject', 'auditor', 'admin'];

export function isUserRole(value: unknown): value is UserRole {
  return USER_ROLES.some((role) => role === value);
}
