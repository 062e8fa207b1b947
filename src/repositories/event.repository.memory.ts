import { TrackedEvent } from '../types/event';
import { toPage } from '../types/pagination';
import { EventRepository } from './event.repository';
import { createSerialLock } from './serial-lock';
import { isDeleted } from '../services/audit-stamp';

export function createInMemoryEventRepository(): EventRepository {
  const store = new Map<string, TrackedEvent>();
  const exclusive = createSerialLock();

  function active(id: string): TrackedEvent | undefined {
    const event = store.get(id);
    return event && !isDeleted(event) ? { ...event } : undefined;
  }

  function build(inTransaction: boolean): EventRepository {
    const repo: EventRepository = {
      async insert(event) {
        store.set(event.id, { ...event });
        return { ...event };
      },
      async findById(id) {
        return active(id);
      },
      async findByIdIncludingDeleted(id) {
        const event = store.get(id);
        return event ? { ...event } : undefined;
      },
      async listByOwner(ownerId, request) {
        const owned = Array.from(store.values())
          .filter((event) => event.ownerId === ownerId && !isDeleted(event))
          .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
        const start = request.page * request.size;
        const items = owned.slice(start, start + request.size).map((event) => ({ ...event }));
        return toPage(items, owned.length, request);
      },
      async update(event) {
        const current = active(event.id);
        if (!current) {
          return undefined;
        }
        const updated: TrackedEvent = {
          ...current,
          type: event.type,
          from: event.from,
          to: event.to,
          updatedAt: event.updatedAt,
          updatedBy: event.updatedBy,
        };
        store.set(event.id, updated);
        return { ...updated };
      },
      async markDeleted(id, stamp) {
        const current = active(id);
        if (!current) {
          return undefined;
        }
        const deleted: TrackedEvent = {
          ...current,
          updatedAt: stamp.deletedAt,
          updatedBy: stamp.deletedBy,
          deletedAt: stamp.deletedAt,
          deletedBy: stamp.deletedBy,
        };
        store.set(id, deleted);
        return { ...deleted };
      },
      transaction(fn) {
        return inTransaction ? fn(repo) : exclusive(() => fn(build(true)));
      },
    };
    return repo;
  }

  return build(false);
}
