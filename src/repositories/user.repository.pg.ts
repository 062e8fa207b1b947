import { DatabaseError, Pool, PoolClient } from 'pg';
import { validate as isUuid } from 'uuid';
import { Credential } from '../types/auth';
import { DuplicateIdentity } from '../types/errors';
import { toPage } from '../types/pagination';
import { withTransaction } from '../db/pool';
import { NewCredential, UserRepository } from './user.repository';

interface UserRow {
  id: string;
  username: string;
  email: string;
  password_hash: string;
  created_at: Date;
  created_by: string | null;
  updated_at: Date;
  updated_by: string | null;
  deleted_at: Date | null;
  deleted_by: string | null;
}

const COLUMNS = `id, username, email, password_hash, created_at, created_by, updated_at, updated_by,
  deleted_at, deleted_by`;

function toCredential(row: UserRow): Credential {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
    createdBy: row.created_by,
    updatedAt: row.updated_at,
    updatedBy: row.updated_by,
    deletedAt: row.deleted_at,
    deletedBy: row.deleted_by,
  };
}

export function createPgUserRepository(pool: Pool): UserRepository {
  function build(db: Pool | PoolClient): UserRepository {
    const repo: UserRepository = {
      async insert(user: NewCredential) {
        const taken = await db.query<{ username: string; email: string }>(
          `SELECT username, email FROM users WHERE lower(username) = lower($1) OR lower(email) = lower($2)`,
          [user.username, user.email]
        );
        const clash = taken.rows[0];
        if (clash) {
          throw clash.username.toLowerCase() === user.username.toLowerCase()
            ? new DuplicateIdentity('username', user.username)
            : new DuplicateIdentity('email', user.email);
        }

        try {
          const result = await db.query<UserRow>(
            `INSERT INTO users (id, username, email, password_hash, created_at, created_by, updated_at, updated_by)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
             RETURNING ${COLUMNS}`,
            [
              user.id,
              user.username,
              user.email,
              user.passwordHash,
              user.createdAt,
              user.createdBy,
              user.updatedAt,
              user.updatedBy,
            ]
          );
          return toCredential(result.rows[0]);
        } catch (err) {
          // Lost a race with a concurrent registration
          if (err instanceof DatabaseError && err.code === '23505') {
            throw err.constraint?.includes('email')
              ? new DuplicateIdentity('email', user.email)
              : new DuplicateIdentity('username', user.username);
          }
          throw err;
        }
      },

      async findById(id, options) {
        if (!isUuid(id)) return undefined;
        const result = await db.query<UserRow>(
          `SELECT ${COLUMNS} FROM users WHERE id = $1 AND deleted_at IS NULL${options?.forUpdate ? ' FOR UPDATE' : ''}`,
          [id]
        );
        return result.rows[0] ? toCredential(result.rows[0]) : undefined;
      },

      async findByUsername(username) {
        const result = await db.query<UserRow>(
          `SELECT ${COLUMNS} FROM users WHERE lower(username) = lower($1) AND deleted_at IS NULL`,
          [username]
        );
        return result.rows[0] ? toCredential(result.rows[0]) : undefined;
      },

      async findByIdIncludingDeleted(id) {
        if (!isUuid(id)) return undefined;
        const result = await db.query<UserRow>(`SELECT ${COLUMNS} FROM users WHERE id = $1`, [id]);
        return result.rows[0] ? toCredential(result.rows[0]) : undefined;
      },

      async findAll(request) {
        const count = await db.query<{ total: string }>(
          `SELECT COUNT(*) AS total FROM users WHERE deleted_at IS NULL`
        );
        const result = await db.query<UserRow>(
          `SELECT ${COLUMNS} FROM users
           WHERE deleted_at IS NULL
           ORDER BY created_at, id
           LIMIT $1 OFFSET $2`,
          [request.size, request.page * request.size]
        );
        return toPage(result.rows.map(toCredential), parseInt(count.rows[0]?.total ?? '0', 10), request);
      },

      async markDeleted(id, stamp) {
        const result = await db.query<UserRow>(
          `UPDATE users
           SET deleted_at = $2, deleted_by = $3, updated_at = $2, updated_by = $3
           WHERE id = $1 AND deleted_at IS NULL
           RETURNING ${COLUMNS}`,
          [id, stamp.deletedAt, stamp.deletedBy]
        );
        return result.rows[0] ? toCredential(result.rows[0]) : undefined;
      },

      transaction(fn) {
        return db === pool ? withTransaction(pool, (client) => fn(build(client))) : fn(repo);
      },

      async ping() {
        await db.query('SELECT 1');
      },
    };
    return repo;
  }

  return build(pool);
}
