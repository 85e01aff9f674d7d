// =============================================================================
// SEALED RATINGS — Authentication Types
// =============================================================================

import { UserRole } from './roles';

/** Caller identity from a verified bearer token (`sub` + `roles` claims) */
export interface AuthenticatedUser {
  id: string;
  roles: UserRole[];
}

