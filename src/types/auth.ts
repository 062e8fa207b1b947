// =============================================================================
// TRACKWELL — Authentication Types
// =============================================================================

import { AuditFields } from '../services/audit-stamp';

/** JWT claims carried by every bearer token */
export interface JwtPayload {
  /** Username of the principal */
  sub: string;
  /** Issued at (epoch seconds) */
  iat: number;
  /** Expires at (epoch seconds, may be fractional) */
  exp: number;
}

/**
 * Stored identity of a principal. Identity fields are immutable once
 * created; passwordHash could be rotated but no flow does so yet.
 */
export interface Credential extends AuditFields {
  id: string;
  username: string;
  email: string;
  passwordHash: string;
}

/**
 * The identity established for one request. Produced by the request
 * authenticator, consumed by the ownership guard and audit stamping.
 */
export interface AuthenticatedPrincipal {
  readonly id: string;
  readonly username: string;
}

/** Why a request ended up without a principal */
export type AnonymousReason =
  | 'missing_header'
  | 'unsupported_scheme'
  | 'malformed_token'
  | 'unknown_principal'
  | 'lookup_failed'
  | 'invalid_token';

/** Terminal state of the per-request authentication pipeline */
export type AuthenticationOutcome =
  | { status: 'authenticated'; principal: AuthenticatedPrincipal }
  | { status: 'already_authenticated'; principal: AuthenticatedPrincipal }
  | { status: 'anonymous'; reason: AnonymousReason };

/** Public view of a credential, safe to return over the wire */
export interface UserProfile {
  id: string;
  username: string;
  email: string;
  createdAt: Date;
  updatedAt: Date;
}

export function toUserProfile(credential: Credential): UserProfile {
  return {
    id: credential.id,
    username: credential.username,
    email: credential.email,
    createdAt: credential.createdAt,
    updatedAt: credential.updatedAt,
  };
}

/** What any authenticated caller may see of another account */
export interface PublicProfile {
  id: string;
  username: string;
  createdAt: Date;
}

export function toPublicProfile(credential: Credential): PublicProfile {
  return { id: credential.id, username: credential.username, createdAt: credential.createdAt };
}
