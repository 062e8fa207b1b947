import { Credential } from '../types/auth';
import { DuplicateIdentity } from '../types/errors';
import { NewCredential, UserRepository } from './user.repository';
import { toPage } from '../types/pagination';
import { createSerialLock } from './serial-lock';
import { isDeleted } from '../services/audit-stamp';

function usernameKey(username: string): string {
  return username.toLowerCase();
}

function emailKey(email: string): string {
  return email.toLowerCase();
}

export function createInMemoryUserRepository(): UserRepository {
  const store = new Map<string, Credential>();
  const usernameIndex = new Map<string, string>();
  const emailIndex = new Map<string, string>();
  const exclusive = createSerialLock();

  function active(id: string | undefined): Credential | undefined {
    const user = id ? store.get(id) : undefined;
    return user && !isDeleted(user) ? { ...user } : undefined;
  }

  function build(inTransaction: boolean): UserRepository {
    const repo: UserRepository = {
      async insert(user: NewCredential) {
        // Deleted accounts keep their username and email reserved.
        if (usernameIndex.has(usernameKey(user.username))) {
          throw new DuplicateIdentity('username', user.username);
        }
        if (emailIndex.has(emailKey(user.email))) {
          throw new DuplicateIdentity('email', user.email);
        }
        const stored: Credential = { ...user, deletedAt: null, deletedBy: null };
        store.set(stored.id, stored);
        usernameIndex.set(usernameKey(stored.username), stored.id);
        emailIndex.set(emailKey(stored.email), stored.id);
        return { ...stored };
      },
      async findById(id) {
        return active(id);
      },
      async findByUsername(username) {
        return active(usernameIndex.get(usernameKey(username)));
      },
      async findByIdIncludingDeleted(id) {
        const user = store.get(id);
        return user ? { ...user } : undefined;
      },
      async findAll(request) {
        const accounts = Array.from(store.values())
          .filter((user) => !isDeleted(user))
          .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
        const start = request.page * request.size;
        const items = accounts.slice(start, start + request.size).map((user) => ({ ...user }));
        return toPage(items, accounts.length, request);
      },

      async markDeleted(id, stamp) {
        const user = store.get(id);
        if (!user || user.deletedAt !== null) {
          return undefined;
        }
        const deleted: Credential = {
          ...user,
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
      async ping() {},
    };
    return repo;
  }

  return build(false);
}
