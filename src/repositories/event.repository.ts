import { TrackedEvent } from '../types/event';
import { Page, PageRequest } from '../types/pagination';
import { DeletionStamp } from '../services/audit-stamp';

/**
 * Stored events. Every read except findByIdIncludingDeleted skips
 * soft-deleted rows.
 */
export interface EventRepository {
  insert(event: TrackedEvent): Promise<TrackedEvent>;
  findById(id: string, options?: { forUpdate?: boolean }): Promise<TrackedEvent | undefined>;
  findByIdIncludingDeleted(id: string): Promise<TrackedEvent | undefined>;
  /** Owner filter first, then the page window. */
  listByOwner(ownerId: string, request: PageRequest): Promise<Page<TrackedEvent>>;
  /** Writes the client fields and the updated stamp; last write wins. */
  update(event: TrackedEvent): Promise<TrackedEvent | undefined>;
  markDeleted(id: string, stamp: DeletionStamp): Promise<TrackedEvent | undefined>;
  transaction<T>(fn: (tx: EventRepository) => Promise<T>): Promise<T>;
}

export { createInMemoryEventRepository } from './event.repository.memory';
export { createPgEventRepository } from './event.repository.pg';
