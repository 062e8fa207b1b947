// =============================================================================
// TRACKWELL — Main Server
// Resource tracking API with token authentication and ownership checks.
// =============================================================================

import { config } from './config';
import { createPool } from './db/pool';
import { createApp, SERVICE_VERSION } from './app';
import { TokenCodec } from './auth/token-codec';
import { createPgUserRepository } from './repositories/user.repository';
import { createPgEventRepository } from './repositories/event.repository';

const pool = createPool(config.db.connectionString);

const app = createApp({
  users: createPgUserRepository(pool),
  events: createPgEventRepository(pool),
  codec: new TokenCodec({ secret: config.jwt.secret, ttlMs: config.jwt.ttlMs }),
  bcryptRounds: config.bcrypt.rounds,
  nodeEnv: config.nodeEnv,
  rateLimit: config.rateLimit,
  logRequests: config.logging.requests,
});

const server = app.listen(config.port, () => {
  console.log(`
╔══════════════════════════════════════════════════════════════╗
║  TRACKWELL — Resource Tracking API                           ║
║  Version ${SERVICE_VERSION.padEnd(52)}║
║                                                              ║
║  Port:     ${String(config.port).padEnd(50)}║
║  Env:      ${config.nodeEnv.padEnd(50)}║
║  Token TTL ${`${config.jwt.ttlMs}ms`.padEnd(50)}║
║                                                              ║
║    /api/auth/*    → register, login, session                 ║
║    /api/events/*  → owned events (bearer token)              ║
║    /api/users/*   → accounts (bearer token)                  ║
║    /api/health    → unauthenticated health probe             ║
╚══════════════════════════════════════════════════════════════╝
  `);
});

function shutdown(signal: string): void {
  console.log(`[Server] ${signal} received, closing`);
  server.close(() => {
    pool.end().then(
      () => process.exit(0),
      (err: Error) => {
        console.error('[Server] Pool shutdown failed:', err.message);
        process.exit(1);
      }
    );
  });
}

process.on('SIGTERM', () => shutdown('SIGTERM'));
process.on('SIGINT', () => shutdown('SIGINT'));
