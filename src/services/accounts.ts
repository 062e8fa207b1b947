// =============================================================================
// TRACKWELL — Account Service
//
// Registration and login. Login issues a token through the codec; this is
// the only place tokens come from.
// =============================================================================

import bcrypt from 'bcryptjs';
import { v4 as uuidv4 } from 'uuid';
import { AuthenticatedPrincipal, Credential, PublicProfile, toPublicProfile } from '../types/auth';
import { Page, PageRequest } from '../types/pagination';
import { AccessDecision, Owned } from '../types/authorization';
import { InvalidCredentials, PrincipalNotFound } from '../types/errors';
import { PrincipalStore } from '../auth/principal-store';
import { TokenCodec } from '../auth/token-codec';
import { authorizeAccess } from '../auth/ownership-guard';
import { UserRepository } from '../repositories/user.repository';
import { creationStamp } from './audit-stamp';
import { softDelete } from './soft-delete';

export interface Registration {
  username: string;
  email: string;
  password: string;
}

export interface LoginResult {
  credential: Credential;
  token: string;
  expiresAt: Date;
}

/** An account is owned by itself. */
export type OwnedCredential = Credential & Owned;

function asOwned(credential: Credential | undefined): OwnedCredential | undefined {
  return credential ? { ...credential, ownerId: credential.id } : undefined;
}

export function createAccountService(deps: {
  users: UserRepository;
  principals: PrincipalStore;
  codec: TokenCodec;
  bcryptRounds: number;
  now?: () => Date;
}) {
  const { users, principals, codec, bcryptRounds } = deps;
  const now = deps.now ?? (() => new Date());

  return {
    /** Throws DuplicateIdentity when the username or email is taken. */
    async register(input: Registration): Promise<Credential> {
      const passwordHash = await bcrypt.hash(input.password, bcryptRounds);
      return users.insert({
        id: uuidv4(),
        username: input.username,
        email: input.email,
        passwordHash,
        ...creationStamp(null, now()),
      });
    },

    /** Throws InvalidCredentials for an unknown user or a wrong password. */
    async login(username: string, password: string): Promise<LoginResult> {
      let credential: Credential;
      try {
        credential = await principals.loadByUsername(username);
      } catch (err) {
        if (err instanceof PrincipalNotFound) {
          throw new InvalidCredentials(username);
        }
        throw err;
      }

      const passwordValid = await bcrypt.compare(password, credential.passwordHash);
      if (!passwordValid) {
        throw new InvalidCredentials(username);
      }

      const token = codec.issue(credential);
      return { credential, token, expiresAt: codec.extractExpiration(token) };
    },

    async getById(id: string): Promise<Credential | undefined> {
      return users.findById(id);
    },

    async getByUsername(username: string): Promise<Credential | undefined> {
      return users.findByUsername(username);
    },

    async listProfiles(request: PageRequest): Promise<Page<PublicProfile>> {
      const page = await users.findAll(request);
      return { ...page, items: page.items.map(toPublicProfile) };
    },

    /** Only the account itself may close it. */
    async close(
      principal: AuthenticatedPrincipal | null,
      id: string,
    ): Promise<AccessDecision<OwnedCredential>> {
      return users.transaction((tx) =>
        softDelete(
          principal,
          id,
          {
            load: async (key) => asOwned(await tx.findById(key, { forUpdate: true })),
            markDeleted: async (key, stamp) => asOwned(await tx.markDeleted(key, stamp)),
          },
          now(),
        )
      );
    },

    /** Read access to one's own account record. */
    async getOwn(
      principal: AuthenticatedPrincipal | null,
      id: string,
    ): Promise<AccessDecision<OwnedCredential>> {
      return authorizeAccess(principal, id, async (key) => asOwned(await users.findById(key)));
    },
  };
}

export type AccountService = ReturnType<typeof createAccountService>;
