import { Credential } from '../types/auth';
import { Page, PageRequest } from '../types/pagination';
import { DeletionStamp } from '../services/audit-stamp';

export type NewCredential = Omit<Credential, 'deletedAt' | 'deletedBy'>;

/**
 * Stored accounts. Every finder except findByIdIncludingDeleted skips
 * soft-deleted rows.
 */
export interface UserRepository {
  /** Throws DuplicateIdentity when the username or email is taken. */
  insert(user: NewCredential): Promise<Credential>;
  findById(id: string, options?: { forUpdate?: boolean }): Promise<Credential | undefined>;
  findByUsername(username: string): Promise<Credential | undefined>;
  findByIdIncludingDeleted(id: string): Promise<Credential | undefined>;
  /** Active accounts, oldest first. */
  findAll(request: PageRequest): Promise<Page<Credential>>;
  markDeleted(id: string, stamp: DeletionStamp): Promise<Credential | undefined>;
  transaction<T>(fn: (tx: UserRepository) => Promise<T>): Promise<T>;
  ping(): Promise<void>;
}

export { createInMemoryUserRepository } from './user.repository.memory';
export { createPgUserRepository } from './user.repository.pg';
