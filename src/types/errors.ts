// =============================================================================
// TRACKWELL — Error Types
//
// Authentication-stage errors (TokenMalformed, PrincipalNotFound) are absorbed
// by the request authenticator. Authorization outcomes are not errors at all:
// see AccessDecision in ./authorization.
// =============================================================================

/** The token could not be parsed or its signature did not verify */
export class TokenMalformed extends Error {
  readonly name = 'TokenMalformed';

  constructor(reason: string) {
    super(`Malformed token: ${reason}`);
  }
}

/** No active principal is stored under the username */
export class PrincipalNotFound extends Error {
  readonly name = 'PrincipalNotFound';

  constructor(readonly username: string) {
    super(`Principal not found: ${username}`);
  }
}

/** Username or email is already registered */
export class DuplicateIdentity extends Error {
  readonly name = 'DuplicateIdentity';

  constructor(readonly field: 'username' | 'email', readonly value: string) {
    super(`${field === 'username' ? 'Username' : 'Email'} already exists: ${value}`);
  }
}

/**
 * Login failed. Unknown user and wrong password carry the same message
 * so the response does not reveal which usernames exist.
 */
export class InvalidCredentials extends Error {
  readonly name = 'InvalidCredentials';

  constructor(readonly username: string) {
    super('Invalid username or password');
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
