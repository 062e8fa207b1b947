// =============================================================================
// TRACKWELL — Request Authenticator
//
// Per-request authentication pipeline. Fail-open: every path ends either
// with a principal installed in the security context or with the context
// left empty, and the request always continues. Rejecting anonymous access
// to protected operations is the perimeter's job (requireAuthentication,
// ownership guard).
//
//   1. no Authorization header              → anonymous (missing_header)
//   2. header not "Bearer <token>"           → anonymous (unsupported_scheme)
//   3. token does not decode                 → anonymous (malformed_token)
//   4. context already holds a principal     → skip (already_authenticated)
//   5. subject no longer resolvable          → anonymous (unknown_principal)
//   6. token not valid for that principal    → anonymous (invalid_token)
//      otherwise                             → principal installed
// =============================================================================

import { AuthenticationOutcome, Credential } from '../types/auth';
import { PrincipalNotFound, errorMessage } from '../types/errors';
import { PrincipalStore } from './principal-store';
import { SecurityContext } from './security-context';
import { TokenCodec } from './token-codec';

const BEARER_PREFIX = 'Bearer ';

/** Token of a "Bearer <token>" header, undefined for any other header. */
export function bearerToken(authorization: string | undefined): string | undefined {
  if (!authorization || !authorization.startsWith(BEARER_PREFIX)) {
    return undefined;
  }
  return authorization.slice(BEARER_PREFIX.length);
}

export interface RequestAuthenticator {
  /** Total: resolves for every input, never rejects. */
  authenticate(
    authorization: string | undefined,
    context: SecurityContext,
  ): Promise<AuthenticationOutcome>;
}

export function createRequestAuthenticator(deps: {
  codec: TokenCodec;
  principals: PrincipalStore;
}): RequestAuthenticator {
  const { codec, principals } = deps;

  return {
    async authenticate(authorization, context) {
      if (!authorization) {
        return { status: 'anonymous', reason: 'missing_header' };
      }
      if (!authorization.startsWith(BEARER_PREFIX)) {
        return { status: 'anonymous', reason: 'unsupported_scheme' };
      }

      const token = authorization.slice(BEARER_PREFIX.length);

      let username: string;
      try {
        username = codec.parseSubject(token);
      } catch (err) {
        console.warn('[Auth] Rejected bearer token:', errorMessage(err));
        return { status: 'anonymous', reason: 'malformed_token' };
      }

      const existing = context.current();
      if (existing) {
        return { status: 'already_authenticated', principal: existing };
      }

      let credential: Credential;
      try {
        credential = await principals.loadByUsername(username);
      } catch (err) {
        if (err instanceof PrincipalNotFound) {
          return { status: 'anonymous', reason: 'unknown_principal' };
        }
        console.error('[Auth] Principal lookup failed:', errorMessage(err));
        return { status: 'anonymous', reason: 'lookup_failed' };
      }

      if (!codec.isValid(token, credential)) {
        return { status: 'anonymous', reason: 'invalid_token' };
      }

      const principal = { id: credential.id, username: credential.username };
      context.install(principal);
      return { status: 'authenticated', principal };
    },
  };
}
