// =============================================================================
// TRACKWELL — Integration Test Helpers
//
// Starts the application in process on an ephemeral port, backed by the
// in-memory repositories, and talks to it over HTTP with fetch.
// =============================================================================

import { Server } from 'http';
import { createApp } from '../src/app';
import { TokenCodec } from '../src/auth/token-codec';
import {
  UserRepository,
  createInMemoryUserRepository,
} from '../src/repositories/user.repository';
import {
  EventRepository,
  createInMemoryEventRepository,
} from '../src/repositories/event.repository';

export const TEST_SECRET = 'test-secret';
export const PASSWORD = 'secret123';

export interface TestServer {
  baseUrl: string;
  users: UserRepository;
  events: EventRepository;
  codec: TokenCodec;
  close(): Promise<void>;
}

export async function startTestServer(options: { ttlMs?: number } = {}): Promise<TestServer> {
  const users = createInMemoryUserRepository();
  const events = createInMemoryEventRepository();
  const codec = new TokenCodec({ secret: TEST_SECRET, ttlMs: options.ttlMs ?? 60 * 60 * 1000 });

  const app = createApp({
    users,
    events,
    codec,
    bcryptRounds: 4,
    nodeEnv: 'test',
    rateLimit: { authMax: 1000, apiMax: 1000 },
    logRequests: false,
  });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Test server did not bind to a TCP port');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    users,
    events,
    codec,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.closeAllConnections();
        server.close((err) => (err ? reject(err) : resolve()));
      }),
  };
}

/**
 * Make an API request to the test server.
 * Returns the raw Response object for flexible assertion.
 */
export async function api(
  server: TestServer,
  method: string,
  path: string,
  body?: unknown,
  token?: string,
): Promise<Response> {
  const headers: Record<string, string> = {};
  if (token) {
    headers['Authorization'] = `Bearer ${token}`;
  }
  if (body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }

  return fetch(`${server.baseUrl}${path}`, {
    method,
    headers,
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

/**
 * Parse JSON response with error context.
 */
export async function json<T>(res: Response): Promise<T> {
  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch {
    throw new Error(`Expected JSON but got: ${text.slice(0, 200)}`);
  }
}

export interface RegisteredUser {
  id: string;
  username: string;
  token: string;
}

/** Register and log in; returns the new account's id and token. */
export async function signUp(server: TestServer, username: string): Promise<RegisteredUser> {
  const registered = await api(server, 'POST', '/api/auth/register', {
    username,
    email: `${username}@example.com`,
    password: PASSWORD,
  });
  if (registered.status !== 201) {
    throw new Error(`Registration failed for ${username}: ${registered.status}`);
  }

  const loggedIn = await api(server, 'POST', '/api/auth/login', { username, password: PASSWORD });
  if (loggedIn.status !== 200) {
    throw new Error(`Login failed for ${username}: ${loggedIn.status}`);
  }
  const body = await json<{ token: string; userId: string }>(loggedIn);
  return { id: body.userId, username, token: body.token };
}
