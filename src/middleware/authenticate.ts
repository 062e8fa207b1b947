// =============================================================================
// TRACKWELL — Authentication Middleware
//
// authenticateRequest runs on every request and never rejects one: it
// gives the request a security context and lets the request authenticator
// fill it (or not). requireAuthentication is the perimeter check mounted
// on protected route groups.
// =============================================================================

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { RequestAuthenticator } from '../auth/request-authenticator';
import { SecurityContext, currentPrincipal } from '../auth/security-context';
import { errorMessage } from '../types/errors';

export function authenticateRequest(authenticator: RequestAuthenticator): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const context = req.securityContext ?? new SecurityContext();
    req.securityContext = context;

    authenticator.authenticate(req.headers.authorization, context).then(
      () => next(),
      (err: unknown) => {
        // Unreachable by contract; the request still proceeds unauthenticated.
        console.error('[Auth] Authenticator failed:', errorMessage(err));
        next();
      }
    );
  };
}

/**
 * Rejects requests without an authenticated principal with 401.
 * Must be used AFTER authenticateRequest.
 */
export function requireAuthentication(req: Request, res: Response, next: NextFunction): void {
  if (!currentPrincipal(req)) {
    res.status(401).json({ error: 'Authentication required' });
    return;
  }
  next();
}
