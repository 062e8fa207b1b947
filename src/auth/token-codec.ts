// =============================================================================
// TRACKWELL — Token Codec
//
// Issues and parses HS256 bearer tokens carrying { sub, iat, exp }.
// Signature and structure are checked by parseSubject/extractExpiration;
// expiry is only judged by isValid, so an expired token still yields its
// subject and expiration for introspection.
// =============================================================================

import jwt, { JwtPayload as VerifiedClaims } from 'jsonwebtoken';
import { JwtPayload } from '../types/auth';
import { TokenMalformed, errorMessage } from '../types/errors';

export interface TokenCodecOptions {
  /** Symmetric signing key */
  secret: string;
  /** Token lifetime in milliseconds */
  ttlMs: number;
  /** Clock in epoch milliseconds, defaults to Date.now */
  now?: () => number;
}

function expiresAtMs(payload: JwtPayload): number {
  return Math.round(payload.exp * 1000);
}

export class TokenCodec {
  private readonly now: () => number;

  constructor(private readonly options: TokenCodecOptions) {
    this.now = options.now ?? Date.now;
  }

  /** Sign a fresh token for the principal. */
  issue(principal: { username: string }): string {
    const issuedAtMs = this.now();
    const payload: JwtPayload = {
      sub: principal.username,
      iat: Math.floor(issuedAtMs / 1000),
      // Millisecond precision, so exp may be fractional
      exp: (issuedAtMs + this.options.ttlMs) / 1000,
    };
    return jwt.sign(payload, this.options.secret, { algorithm: 'HS256' });
  }

  /** Username the token was issued for. Throws TokenMalformed. */
  parseSubject(token: string): string {
    return this.decode(token).sub;
  }

  /** Expiration instant of the token. Throws TokenMalformed. */
  extractExpiration(token: string): Date {
    return new Date(expiresAtMs(this.decode(token)));
  }

  /**
   * True iff the token verifies, names this principal and has not expired.
   * Never throws: a token that cannot be decoded is simply invalid.
   */
  isValid(token: string, principal: { username: string }): boolean {
    let payload: JwtPayload;
    try {
      payload = this.decode(token);
    } catch {
      return false;
    }
    return payload.sub === principal.username && expiresAtMs(payload) > this.now();
  }

  private decode(token: string): JwtPayload {
    let decoded: string | VerifiedClaims;
    try {
      decoded = jwt.verify(token, this.options.secret, {
        algorithms: ['HS256'],
        ignoreExpiration: true,
      });
    } catch (err) {
      throw new TokenMalformed(errorMessage(err));
    }

    if (typeof decoded === 'string') {
      throw new TokenMalformed('payload is not a claims object');
    }
    const { sub, iat, exp } = decoded;
    if (typeof sub !== 'string' || typeof iat !== 'number' || typeof exp !== 'number') {
      throw new TokenMalformed('missing sub, iat or exp claim');
    }
    return { sub, iat, exp };
  }
}
