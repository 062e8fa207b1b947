// =============================================================================
// TRACKWELL — Authentication Routes
//
// Registration, login and session introspection. There is no logout:
// tokens are not tracked server-side and stay valid until they expire.
// =============================================================================

import { Router, Request, Response } from 'express';
import { AccountService } from '../services/accounts';
import { TokenCodec } from '../auth/token-codec';
import { bearerToken } from '../auth/request-authenticator';
import { requireAuthentication } from '../middleware/authenticate';
import { currentPrincipal } from '../auth/security-context';
import { toUserProfile } from '../types/auth';
import { DuplicateIdentity, InvalidCredentials, errorMessage } from '../types/errors';
import { isNonEmptyString, readBody } from './body';

const USERNAME_MIN = 3;
const USERNAME_MAX = 50;
const PASSWORD_MIN = 6;

/** Identity fields are compared and stored without surrounding whitespace. */
function trimmed(value: unknown): unknown {
  return typeof value === 'string' ? value.trim() : value;
}

export function createAuthRouter(accounts: AccountService, codec: TokenCodec): Router {
  const router = Router();

  /**
   * POST /api/auth/register
   * Create an account. Returns the public profile, never the hash.
   */
  router.post('/register', async (req: Request, res: Response) => {
    const body = readBody(req.body);
    const username = trimmed(body.username);
    const email = trimmed(body.email);
    const { password } = body;

    const problems: string[] = [];
    if (typeof username !== 'string' || username.length < USERNAME_MIN || username.length > USERNAME_MAX) {
      problems.push(`username must be ${USERNAME_MIN}-${USERNAME_MAX} characters`);
    }
    if (!isNonEmptyString(email) || !email.includes('@')) {
      problems.push('email must be a valid address');
    }
    if (typeof password !== 'string' || password.length < PASSWORD_MIN) {
      problems.push(`password must be at least ${PASSWORD_MIN} characters`);
    }
    if (problems.length > 0 || typeof username !== 'string' || typeof email !== 'string' || typeof password !== 'string') {
      res.status(400).json({ error: 'Invalid registration', details: problems });
      return;
    }

    try {
      const credential = await accounts.register({ username, email, password });
      console.log(`[Auth] Registered user ${credential.username} (${credential.id})`);
      res.status(201).json({ user: toUserProfile(credential) });
    } catch (err) {
      if (err instanceof DuplicateIdentity) {
        res.status(409).json({ error: err.message });
        return;
      }
      console.error('[Auth] Registration error:', errorMessage(err));
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  /**
   * POST /api/auth/login
   * Exchange username and password for a bearer token.
   */
  router.post('/login', async (req: Request, res: Response) => {
    const body = readBody(req.body);
    const username = trimmed(body.username);
    const { password } = body;

    if (!isNonEmptyString(username) || typeof password !== 'string' || password.length === 0) {
      res.status(400).json({ error: 'Username and password required' });
      return;
    }

    try {
      const { credential, token, expiresAt } = await accounts.login(username, password);
      console.log(`[Auth] Login successful: ${credential.username}`);
      res.json({
        userId: credential.id,
        username: credential.username,
        email: credential.email,
        token,
        expiresAt,
        message: 'Login successful',
      });
    } catch (err) {
      if (err instanceof InvalidCredentials) {
        console.warn(`[Auth] Login failed for ${err.username}`);
        res.status(401).json({ error: err.message });
        return;
      }
      console.error('[Auth] Login error:', errorMessage(err));
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  /**
   * GET /api/auth/session
   * The principal the bearer token resolved to, and when the token expires.
   */
  router.get('/session', requireAuthentication, (req: Request, res: Response) => {
    const token = bearerToken(req.headers.authorization);
    try {
      res.json({
        principal: currentPrincipal(req),
        expiresAt: token === undefined ? null : codec.extractExpiration(token),
        sessionActive: true,
      });
    } catch (err) {
      console.error('[Auth] Session error:', errorMessage(err));
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
