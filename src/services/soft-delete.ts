// =============================================================================
// TRACKWELL — Soft Delete Lifecycle
//
// Marks an owned record deleted (timestamp + actor) instead of removing it.
// Callers run softDelete inside one repository transaction with a locking
// loader, so the ownership check and the write see the same row.
//
// Deleted records are invisible to every read path, including the loader
// used here: deleting twice answers not_found and the first stamp stands.
// =============================================================================

import { AuthenticatedPrincipal } from '../types/auth';
import { AccessDecision, Owned, ResourceLoader } from '../types/authorization';
import { authorizeAccess } from '../auth/ownership-guard';
import { DeletionStamp, deletionStamp } from './audit-stamp';

export interface SoftDeleteTarget<T extends Owned> {
  load: ResourceLoader<T>;
  /** Writes deletedAt and deletedBy in a single statement. */
  markDeleted(id: string, stamp: DeletionStamp): Promise<T | undefined>;
}

export async function softDelete<T extends Owned>(
  principal: AuthenticatedPrincipal | null,
  resourceId: string,
  target: SoftDeleteTarget<T>,
  now: Date,
): Promise<AccessDecision<T>> {
  const decision = await authorizeAccess(principal, resourceId, target.load);
  if (!decision.granted) {
    return decision;
  }

  const deleted = await target.markDeleted(resourceId, deletionStamp(decision.principal, now));
  if (!deleted) {
    return { granted: false, denialReason: 'not_found', resourceId };
  }
  return { granted: true, resource: deleted, principal: decision.principal };
}
