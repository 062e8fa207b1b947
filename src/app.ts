// =============================================================================
// TRACKWELL — Application Factory
//
// Route architecture:
//
//   /api/auth/*     — register, login, session (login rate-limited)
//   /api/events/*   — owned event records (authentication required)
//   /api/users/*    — accounts (authentication required)
//   /api/health     — health check (unauthenticated)
//
// Every request passes authenticateRequest first, which never rejects;
// the routers decide what needs a principal.
// =============================================================================

import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { TokenCodec } from './auth/token-codec';
import { createPrincipalStore } from './auth/principal-store';
import { createRequestAuthenticator } from './auth/request-authenticator';
import { UserRepository } from './repositories/user.repository';
import { EventRepository } from './repositories/event.repository';
import { createAccountService } from './services/accounts';
import { createEventService } from './services/events';
import { authenticateRequest } from './middleware/authenticate';
import { errorHandler, notFound, requestId, requestLogger } from './middleware/security';
import { createAuthRouter } from './routes/auth';
import { createEventRouter } from './routes/events';
import { createUserRouter } from './routes/users';

export const SERVICE_VERSION = '0.1.0';

export interface AppDependencies {
  users: UserRepository;
  events: EventRepository;
  codec: TokenCodec;
  bcryptRounds: number;
  nodeEnv: string;
  rateLimit: { authMax: number; apiMax: number };
  logRequests: boolean;
  now?: () => Date;
}

export function createApp(deps: AppDependencies): express.Express {
  const principals = createPrincipalStore(deps.users);
  const authenticator = createRequestAuthenticator({ codec: deps.codec, principals });
  const accounts = createAccountService({
    users: deps.users,
    principals,
    codec: deps.codec,
    bcryptRounds: deps.bcryptRounds,
    now: deps.now,
  });
  const events = createEventService({ events: deps.events, now: deps.now });

  const app = express();

  // ── Security Middleware ──────────────────────────────────────────────

  app.use(helmet());
  app.use(cors({
    origin: deps.nodeEnv === 'development' ? '*' : undefined,
  }));
  app.use(express.json({ limit: '1mb' }));
  app.use(requestId());
  if (deps.logRequests) {
    app.use(requestLogger());
  }
  app.use(authenticateRequest(authenticator));

  // Brute-force defence on credential endpoints
  const authLimiter = rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: deps.rateLimit.authMax,
    message: { error: 'Too many authentication attempts. Try again later.' },
    standardHeaders: true,
    legacyHeaders: false,
  });

  const apiLimiter = rateLimit({
    windowMs: 1 * 60 * 1000, // 1 minute
    max: deps.rateLimit.apiMax,
    standardHeaders: true,
    legacyHeaders: false,
  });

  // ── Routes ───────────────────────────────────────────────────────────

  const startTime = Date.now();

  app.get('/api/health', async (_req, res) => {
    const checks: Record<string, { status: string; latencyMs: number }> = {};

    const dbStart = Date.now();
    try {
      await deps.users.ping();
      checks.database = { status: 'healthy', latencyMs: Date.now() - dbStart };
    } catch {
      checks.database = { status: 'unhealthy', latencyMs: Date.now() - dbStart };
    }

    const healthy = checks.database.status === 'healthy';
    res.status(healthy ? 200 : 503).json({
      status: healthy ? 'healthy' : 'degraded',
      service: 'trackwell',
      version: SERVICE_VERSION,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      checks,
      timestamp: new Date().toISOString(),
    });
  });

  app.use('/api/auth', authLimiter, createAuthRouter(accounts, deps.codec));
  app.use('/api/events', apiLimiter, createEventRouter(events));
  app.use('/api/users', apiLimiter, createUserRouter(accounts));

  app.use(notFound());
  app.use(errorHandler(deps.nodeEnv));

  return app;
}
