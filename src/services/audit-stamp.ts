// =============================================================================
// TRACKWELL — Audit Stamping
//
// Who created, last changed and deleted a record, and when. Every function
// takes the acting principal explicitly; nothing reads ambient state.
// =============================================================================

import { AuthenticatedPrincipal } from '../types/auth';

export interface AuditFields {
  createdAt: Date;
  createdBy: string | null;
  updatedAt: Date;
  updatedBy: string | null;
  deletedAt: Date | null;
  deletedBy: string | null;
}

/** deletedAt and deletedBy only ever travel together */
export interface DeletionStamp {
  deletedAt: Date;
  deletedBy: string;
}

/** Audit fields for a new record. A null actor means self-registration. */
export function creationStamp(actor: AuthenticatedPrincipal | null, now: Date): AuditFields {
  const actorId = actor ? actor.id : null;
  return {
    createdAt: now,
    createdBy: actorId,
    updatedAt: now,
    updatedBy: actorId,
    deletedAt: null,
    deletedBy: null,
  };
}

export function stampUpdated<T extends AuditFields>(
  record: T,
  actor: AuthenticatedPrincipal,
  now: Date,
): T {
  return { ...record, updatedAt: now, updatedBy: actor.id };
}

export function deletionStamp(actor: AuthenticatedPrincipal, now: Date): DeletionStamp {
  return { deletedAt: now, deletedBy: actor.id };
}

export function isDeleted(record: AuditFields): boolean {
  return record.deletedAt !== null;
}
