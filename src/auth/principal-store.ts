// =============================================================================
// TRACKWELL — Principal Store
//
// Resolves stored credentials by username. Used at login to compare the
// password hash and at request time to re-resolve a token's subject.
// Soft-deleted accounts do not resolve.
// =============================================================================

import { Credential } from '../types/auth';
import { PrincipalNotFound } from '../types/errors';
import { UserRepository } from '../repositories/user.repository';

export interface PrincipalStore {
  /** Throws PrincipalNotFound when no active account has this username. */
  loadByUsername(username: string): Promise<Credential>;
}

export function createPrincipalStore(users: UserRepository): PrincipalStore {
  return {
    async loadByUsername(username) {
      const credential = await users.findByUsername(username);
      if (!credential) {
        throw new PrincipalNotFound(username);
      }
      return credential;
    },
  };
}
