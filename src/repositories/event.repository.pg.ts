import { Pool, PoolClient } from 'pg';
import { validate as isUuid } from 'uuid';
import { TrackedEvent, isEventType } from '../types/event';
import { toPage } from '../types/pagination';
import { withTransaction } from '../db/pool';
import { EventRepository } from './event.repository';

interface EventRow {
  id: string;
  owner_id: string;
  type: string;
  from_value: string;
  to_value: string;
  created_at: Date;
  created_by: string | null;
  updated_at: Date;
  updated_by: string | null;
  deleted_at: Date | null;
  deleted_by: string | null;
}

const COLUMNS = `id, owner_id, type, from_value, to_value,
  created_at, created_by, updated_at, updated_by, deleted_at, deleted_by`;

function toEvent(row: EventRow): TrackedEvent {
  if (!isEventType(row.type)) {
    throw new Error(`Unknown event type in row ${row.id}: ${row.type}`);
  }
  return {
    id: row.id,
    ownerId: row.owner_id,
    type: row.type,
    from: row.from_value,
    to: row.to_value,
    createdAt: row.created_at,
    createdBy: row.created_by,
    updatedAt: row.updated_at,
    updatedBy: row.updated_by,
    deletedAt: row.deleted_at,
    deletedBy: row.deleted_by,
  };
}

function first(rows: EventRow[]): TrackedEvent | undefined {
  return rows[0] ? toEvent(rows[0]) : undefined;
}

export function createPgEventRepository(pool: Pool): EventRepository {
  function build(db: Pool | PoolClient): EventRepository {
    const repo: EventRepository = {
      async insert(event) {
        const result = await db.query<EventRow>(
          `INSERT INTO events (id, owner_id, type, from_value, to_value,
                               created_at, created_by, updated_at, updated_by)
           VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
           RETURNING ${COLUMNS}`,
          [
            event.id,
            event.ownerId,
            event.type,
            event.from,
            event.to,
            event.createdAt,
            event.createdBy,
            event.updatedAt,
            event.updatedBy,
          ]
        );
        return toEvent(result.rows[0]);
      },

      async findById(id, options) {
        if (!isUuid(id)) return undefined;
        const result = await db.query<EventRow>(
          `SELECT ${COLUMNS} FROM events WHERE id = $1 AND deleted_at IS NULL${options?.forUpdate ? ' FOR UPDATE' : ''}`,
          [id]
        );
        return first(result.rows);
      },

      async findByIdIncludingDeleted(id) {
        if (!isUuid(id)) return undefined;
        const result = await db.query<EventRow>(`SELECT ${COLUMNS} FROM events WHERE id = $1`, [id]);
        return first(result.rows);
      },

      async listByOwner(ownerId, request) {
        const count = await db.query<{ total: string }>(
          `SELECT COUNT(*) AS total FROM events WHERE owner_id = $1 AND deleted_at IS NULL`,
          [ownerId]
        );
        const result = await db.query<EventRow>(
          `SELECT ${COLUMNS} FROM events
           WHERE owner_id = $1 AND deleted_at IS NULL
           ORDER BY created_at DESC, id
           LIMIT $2 OFFSET $3`,
          [ownerId, request.size, request.page * request.size]
        );
        return toPage(result.rows.map(toEvent), parseInt(count.rows[0]?.total ?? '0', 10), request);
      },

      async update(event) {
        const result = await db.query<EventRow>(
          `UPDATE events
           SET type = $2, from_value = $3, to_value = $4, updated_at = $5, updated_by = $6
           WHERE id = $1 AND deleted_at IS NULL
           RETURNING ${COLUMNS}`,
          [event.id, event.type, event.from, event.to, event.updatedAt, event.updatedBy]
        );
        return first(result.rows);
      },

      async markDeleted(id, stamp) {
        const result = await db.query<EventRow>(
          `UPDATE events
           SET deleted_at = $2, deleted_by = $3, updated_at = $2, updated_by = $3
           WHERE id = $1 AND deleted_at IS NULL
           RETURNING ${COLUMNS}`,
          [id, stamp.deletedAt, stamp.deletedBy]
        );
        return first(result.rows);
      },

      transaction(fn) {
        return db === pool ? withTransaction(pool, (client) => fn(build(client))) : fn(repo);
      },
    };
    return repo;
  }

  return build(pool);
}
