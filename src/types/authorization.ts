// =============================================================================
// TRACKWELL — Ownership Authorization Types
//
// The ownership guard returns a decision value instead of throwing. Callers
// switch on `granted` and then on `denialReason`; the perimeter maps each
// denial to its status code:
//
//   unauthenticated → 401
//   forbidden       → 403
//   not_found       → 404
//
// not_found is always decided before forbidden: the existence of a resource
// is checked before its owner is compared with the caller.
// =============================================================================

import { AuthenticatedPrincipal } from './auth';

/** Anything that belongs to exactly one principal */
export interface Owned {
  id: string;
  ownerId: string;
}

export type Denial =
  | { granted: false; denialReason: 'unauthenticated' }
  | { granted: false; denialReason: 'not_found'; resourceId: string }
  | { granted: false; denialReason: 'forbidden'; resourceId: string; principalId: string };

/** Result of authorizing access to one owned resource */
export type AccessDecision<T extends Owned> =
  | { granted: true; resource: T; principal: AuthenticatedPrincipal }
  | Denial;

/** Result of requiring an identity for the current operation */
export type PrincipalDecision =
  | { granted: true; principal: AuthenticatedPrincipal }
  | { granted: false; denialReason: 'unauthenticated' };

/** Loads a resource by id; resolves undefined when it does not exist */
export type ResourceLoader<T extends Owned> = (id: string) => Promise<T | undefined>;
