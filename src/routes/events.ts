// =============================================================================
// TRACKWELL — Event Routes
//
// Routes:
//   POST   /api/events        — Record an event owned by the caller
//   GET    /api/events        — Page through the caller's events
//   GET    /api/events/:id    — Get one event (owner only)
//   PUT    /api/events/:id    — Update type/from/to (owner only)
//   DELETE /api/events/:id    — Soft delete (owner only)
//
// ownerId is never read from the request.
// =============================================================================

import { Router, Request, Response } from 'express';
import { EventService } from '../services/events';
import { requireAuthentication } from '../middleware/authenticate';
import { sendDenial } from '../middleware/perimeter';
import { currentPrincipal } from '../auth/security-context';
import { EVENT_TYPES, EventFields, isEventType } from '../types/event';
import { errorMessage } from '../types/errors';
import { Parsed, isNonEmptyString, parsePageRequest, readBody } from './body';

const TYPE_ERROR = `type must be one of ${EVENT_TYPES.join(', ')}`;

function parseEventFields(body: unknown): Parsed<EventFields> {
  const { type, from, to } = readBody(body);
  if (type === undefined || from === undefined || to === undefined) {
    return { ok: false, error: 'Missing required fields: type, from, to' };
  }
  if (!isEventType(type)) return { ok: false, error: TYPE_ERROR };
  if (!isNonEmptyString(from) || !isNonEmptyString(to)) {
    return { ok: false, error: 'from and to must be non-empty strings of at most 255 characters' };
  }
  return { ok: true, value: { type, from, to } };
}

function parseEventPatch(body: unknown): Parsed<Partial<EventFields>> {
  const { type, from, to } = readBody(body);
  const patch: Partial<EventFields> = {};
  if (type !== undefined) {
    if (!isEventType(type)) return { ok: false, error: TYPE_ERROR };
    patch.type = type;
  }
  if (from !== undefined) {
    if (!isNonEmptyString(from)) return { ok: false, error: 'from must be a non-empty string' };
    patch.from = from;
  }
  if (to !== undefined) {
    if (!isNonEmptyString(to)) return { ok: false, error: 'to must be a non-empty string' };
    patch.to = to;
  }
  return { ok: true, value: patch };
}

export function createEventRouter(events: EventService): Router {
  const router = Router();

  router.use(requireAuthentication);

  router.post('/', async (req: Request, res: Response) => {
    const parsed = parseEventFields(req.body);
    if (!parsed.ok) {
      res.status(400).json({ error: parsed.error });
      return;
    }

    try {
      const decision = await events.create(currentPrincipal(req), parsed.value);
      if (!decision.granted) {
        sendDenial(res, decision);
        return;
      }
      res.status(201).json({ event: decision.resource });
    } catch (err) {
      console.error('[Events] Create error:', errorMessage(err));
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  router.get('/', async (req: Request, res: Response) => {
    const parsed = parsePageRequest(req.query);
    if (!parsed.ok) {
      res.status(400).json({ error: parsed.error });
      return;
    }

    try {
      const decision = await events.list(currentPrincipal(req), parsed.value);
      if (!decision.granted) {
        sendDenial(res, decision);
        return;
      }
      res.json(decision.page);
    } catch (err) {
      console.error('[Events] List error:', errorMessage(err));
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  router.get('/:id', async (req: Request, res: Response) => {
    try {
      const decision = await events.get(currentPrincipal(req), req.params.id);
      if (!decision.granted) {
        sendDenial(res, decision);
        return;
      }
      res.json({ event: decision.resource });
    } catch (err) {
      console.error('[Events] Get error:', errorMessage(err));
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  router.put('/:id', async (req: Request, res: Response) => {
    const parsed = parseEventPatch(req.body);
    if (!parsed.ok) {
      res.status(400).json({ error: parsed.error });
      return;
    }

    try {
      const decision = await events.update(currentPrincipal(req), req.params.id, parsed.value);
      if (!decision.granted) {
        sendDenial(res, decision);
        return;
      }
      res.json({ event: decision.resource });
    } catch (err) {
      console.error('[Events] Update error:', errorMessage(err));
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  router.delete('/:id', async (req: Request, res: Response) => {
    try {
      const decision = await events.remove(currentPrincipal(req), req.params.id);
      if (!decision.granted) {
        sendDenial(res, decision);
        return;
      }
      res.status(204).end();
    } catch (err) {
      console.error('[Events] Delete error:', errorMessage(err));
      res.status(500).json({ error: 'Internal server error' });
    }
  });

  return router;
}
