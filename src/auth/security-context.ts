// =============================================================================
// TRACKWELL — Security Context
//
// Request-scoped holder of the authenticated principal. One instance is
// created per request by the authenticate middleware and hangs off the
// request object; nothing here is shared between requests.
// =============================================================================

import { Request } from 'express';
import { AuthenticatedPrincipal } from '../types/auth';

declare global {
  namespace Express {
    interface Request {
      securityContext?: SecurityContext;
      requestId?: string;
    }
  }
}

export class SecurityContext {
  private principal: AuthenticatedPrincipal | null = null;

  current(): AuthenticatedPrincipal | null {
    return this.principal;
  }

  get isAuthenticated(): boolean {
    return this.principal !== null;
  }

  /** Write-once: a second install within the same request is a bug. */
  install(principal: AuthenticatedPrincipal): void {
    if (this.principal) {
      throw new Error('Security context already holds a principal for this request');
    }
    this.principal = Object.freeze({ id: principal.id, username: principal.username });
  }
}

/** Principal of the request, or null when it is unauthenticated. */
export function currentPrincipal(req: Request): AuthenticatedPrincipal | null {
  return req.securityContext?.current() ?? null;
}
