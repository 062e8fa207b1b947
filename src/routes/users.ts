// =============================================================================
// TRACKWELL — User Routes
//
//   GET    /api/users                     — Page of public profiles
//   GET    /api/users/me                  — Own account
//   GET    /api/users/username/:username  — Public profile by username
//   GET    /api/users/:id                 — Public profile of an active account
//   DELETE /api/users/:id   — Close (soft delete) one's own account
// =============================================================================

import { Router, Request, Response } from 'express';
import { AccountService } from '../services/accounts';
import { requireAuthentication } from '../middleware/authenticate';
import { sendDenial } from '../middleware/perimeter';
import { currentPrincipal } from '../auth/security-context';
import { toPublicProfile, toUserProfile } from '../types/auth';
import { errorMessage } from '../types/errors';
import { parsePageRequest } from './body';

export function createUserRouter(accounts: AccountService): Router {
  const router = Router();

  router.use(requireAuthentication);

  router.get('/', async (req: Request, res: Response) => {
    const parsed = parsePageRequest(req.query);
    if (!parsed.ok) {
      res.status(400).json({ error: parsed.error });
      return;
    }

    try {
      res.json(await accounts.listProfiles(parsed.value));
    } catch (err) {
      console.error('[Users] List error:', errorMessage(err));
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  router.get('/me', async (req: Request, res: Response) => {
    const principal = currentPrincipal(req);
    try {
      const decision = await accounts.getOwn(principal, principal ? principal.id : '');
      if (!decision.granted) {
        sendDenial(res, decision);
        return;
      }
      res.json({ user: toUserProfile(decision.resource) });
    } catch (err) {
      console.error('[Users] Profile error:', errorMessage(err));
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  router.get('/username/:username', async (req: Request, res: Response) => {
    try {
      const user = await accounts.getByUsername(req.params.username);
      if (!user) {
        res.status(404).json({ error: 'Resource not found', resourceId: req.params.username });
        return;
      }
      res.json({ user: toPublicProfile(user) });
    } catch (err) {
      console.error('[Users] Lookup error:', errorMessage(err));
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  router.get('/:id', async (req: Request, res: Response) => {
    try {
      const user = await accounts.getById(req.params.id);
      if (!user) {
        res.status(404).json({ error: 'Resource not found', resourceId: req.params.id });
        return;
      }
      res.json({ user: toPublicProfile(user) });
    } catch (err) {
      console.error('[Users] Lookup error:', errorMessage(err));
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  router.delete('/:id', async (req: Request, res: Response) => {
    try {
      const decision = await accounts.close(currentPrincipal(req), req.params.id);
      if (!decision.granted) {
        sendDenial(res, decision);
        return;
      }
      console.log(`[Users] Account ${decision.resource.username} closed`);
      res.status(204).end();
    } catch (err) {
      console.error('[Users] Close error:', errorMessage(err));
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
