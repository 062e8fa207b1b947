// =============================================================================
// TRACKWELL — Ownership Guard
//
// Authorization stage. Decides Not-Found / Unauthenticated / Forbidden /
// Granted for an owned resource and the caller's principal, always looking
// the resource up before comparing owners, so an absent id answers 404 no
// matter who asks.
// =============================================================================

import { AuthenticatedPrincipal } from '../types/auth';
import { AccessDecision, Owned, PrincipalDecision, ResourceLoader } from '../types/authorization';

/** Operations that cannot run without an identity (create, list own). */
export function requireCurrentPrincipal(
  principal: AuthenticatedPrincipal | null,
): PrincipalDecision {
  if (!principal) {
    return { granted: false, denialReason: 'unauthenticated' };
  }
  return { granted: true, principal };
}

/**
 * Load the resource, then require a principal, then require ownership.
 * The loader decides what "exists" means (soft-deleted rows do not).
 */
export async function authorizeAccess<T extends Owned>(
  principal: AuthenticatedPrincipal | null,
  resourceId: string,
  loader: ResourceLoader<T>,
): Promise<AccessDecision<T>> {
  const resource = await loader(resourceId);
  if (!resource) {
    return { granted: false, denialReason: 'not_found', resourceId };
  }

  const required = requireCurrentPrincipal(principal);
  if (!required.granted) {
    return required;
  }

  if (resource.ownerId !== required.principal.id) {
    return {
      granted: false,
      denialReason: 'forbidden',
      resourceId,
      principalId: required.principal.id,
    };
  }

  return { granted: true, resource, principal: required.principal };
}

/**
 * Bind new fields to their owner. Whatever ownerId the fields carry is
 * overwritten with the principal's id.
 */
export function assignOwner<T extends object>(
  fields: T,
  principal: AuthenticatedPrincipal,
): T & { ownerId: string } {
  return { ...fields, ownerId: principal.id };
}
