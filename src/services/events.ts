// =============================================================================
// TRACKWELL — Event Service
//
// CRUD over tracked events, every operation scoped to the caller's
// principal. The principal is passed in explicitly by the route.
// Reads by id, updates and deletes go through the ownership guard;
// update and delete run guard and write in one transaction.
// =============================================================================

import { v4 as uuidv4 } from 'uuid';
import { AuthenticatedPrincipal } from '../types/auth';
import { AccessDecision, PrincipalDecision } from '../types/authorization';
import { EventFields, TrackedEvent } from '../types/event';
import { Page, PageRequest } from '../types/pagination';
import { assignOwner, authorizeAccess, requireCurrentPrincipal } from '../auth/ownership-guard';
import { EventRepository } from '../repositories/event.repository';
import { creationStamp, stampUpdated } from './audit-stamp';
import { softDelete } from './soft-delete';

export type CreateDecision =
  | { granted: true; resource: TrackedEvent }
  | Extract<PrincipalDecision, { granted: false }>;

export type ListDecision =
  | { granted: true; page: Page<TrackedEvent> }
  | Extract<PrincipalDecision, { granted: false }>;

export function createEventService(deps: { events: EventRepository; now?: () => Date }) {
  const { events } = deps;
  const now = deps.now ?? (() => new Date());

  return {
    async create(principal: AuthenticatedPrincipal | null, fields: EventFields): Promise<CreateDecision> {
      const required = requireCurrentPrincipal(principal);
      if (!required.granted) return required;

      const event: TrackedEvent = {
        ...assignOwner(
          { id: uuidv4(), type: fields.type, from: fields.from, to: fields.to },
          required.principal
        ),
        ...creationStamp(required.principal, now()),
      };
      const saved = await events.insert(event);
      console.log(`[Events] Created ${saved.type} event ${saved.id} for ${required.principal.username}`);
      return { granted: true, resource: saved };
    },

    async list(principal: AuthenticatedPrincipal | null, request: PageRequest): Promise<ListDecision> {
      const required = requireCurrentPrincipal(principal);
      if (!required.granted) return required;
      return { granted: true, page: await events.listByOwner(required.principal.id, request) };
    },

    async get(principal: AuthenticatedPrincipal | null, id: string): Promise<AccessDecision<TrackedEvent>> {
      return authorizeAccess(principal, id, (key) => events.findById(key));
    },

    /** Partial update of the client fields; ownerId is never touched. */
    async update(
      principal: AuthenticatedPrincipal | null,
      id: string,
      patch: Partial<EventFields>,
    ): Promise<AccessDecision<TrackedEvent>> {
      return events.transaction(async (tx) => {
        const decision = await authorizeAccess(principal, id, (key) =>
          tx.findById(key, { forUpdate: true })
        );
        if (!decision.granted) return decision;

        const { resource, principal: actor } = decision;
        const changed = stampUpdated(
          {
            ...resource,
            type: patch.type ?? resource.type,
            from: patch.from ?? resource.from,
            to: patch.to ?? resource.to,
          },
          actor,
          now()
        );
        const saved = await tx.update(changed);
        if (!saved) {
          return { granted: false, denialReason: 'not_found', resourceId: id };
        }
        return { granted: true, resource: saved, principal: actor };
      });
    },

    async remove(principal: AuthenticatedPrincipal | null, id: string): Promise<AccessDecision<TrackedEvent>> {
      const decision = await events.transaction((tx) =>
        softDelete(
          principal,
          id,
          {
            load: (key) => tx.findById(key, { forUpdate: true }),
            markDeleted: (key, stamp) => tx.markDeleted(key, stamp),
          },
          now()
        )
      );
      if (decision.granted) {
        console.log(`[Events] Soft-deleted event ${id} by ${decision.principal.username}`);
      }
      return decision;
    },
  };
}

export type EventService = ReturnType<typeof createEventService>;
