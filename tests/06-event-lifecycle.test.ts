// =============================================================================
// TRACKWELL — Test Suite 06: Event Ownership over HTTP
// =============================================================================

import { api, json, RegisteredUser, signUp, startTestServer, TestServer } from './helpers';

interface EventBody {
  id: string;
  ownerId: string;
  type: string;
  from: string;
  to: string;
  createdBy: string | null;
  updatedBy: string | null;
  deletedAt: string | null;
}

interface PageBody {
  items: EventBody[];
  page: number;
  size: number;
  total: number;
  totalPages: number;
}

const UNUSED_ID = '99999999-9999-4999-8999-999999999999';

describe('Event ownership', () => {
  let server: TestServer;
  let alice: RegisteredUser;
  let bob: RegisteredUser;

  beforeAll(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    server = await startTestServer();
    alice = await signUp(server, 'alice');
    bob = await signUp(server, 'bob');
  });

  afterAll(async () => {
    await server.close();
    jest.restoreAllMocks();
  });

  async function createEvent(user: RegisteredUser, fields: Record<string, unknown>): Promise<EventBody> {
    const res = await api(server, 'POST', '/api/events', fields, user.token);
    expect(res.status).toBe(201);
    return (await json<{ event: EventBody }>(res)).event;
  }

  describe('Create', () => {
    test('binds the event to the caller', async () => {
      const event = await createEvent(alice, { type: 'NAVIGATION', from: '/home', to: '/cart' });
      expect(event).toMatchObject({
        ownerId: alice.id,
        type: 'NAVIGATION',
        from: '/home',
        to: '/cart',
        createdBy: alice.id,
        updatedBy: alice.id,
        deletedAt: null,
      });
    });

    test('ignores an ownerId in the payload', async () => {
      const event = await createEvent(bob, { type: 'ACTION', from: 'a', to: 'b', ownerId: alice.id });
      expect(event.ownerId).toBe(bob.id);
    });

    test('rejects an unknown type', async () => {
      const res = await api(server, 'POST', '/api/events', { type: 'CLICK', from: 'a', to: 'b' }, alice.token);
      expect(res.status).toBe(400);
      expect(await json(res)).toEqual({ error: 'type must be one of NAVIGATION, ACTION' });
    });

    test('rejects missing fields', async () => {
      const res = await api(server, 'POST', '/api/events', { type: 'ACTION' }, alice.token);
      expect(res.status).toBe(400);
      expect(await json(res)).toEqual({ error: 'Missing required fields: type, from, to' });
    });

    test('requires a valid token', async () => {
      const res = await api(server, 'POST', '/api/events', { type: 'ACTION', from: 'a', to: 'b' }, 'garbage');
      expect(res.status).toBe(401);
      expect(await json(res)).toEqual({ error: 'Authentication required' });
    });
  });

  describe('Read by id', () => {
    let event: EventBody;

    beforeAll(async () => {
      event = await createEvent(alice, { type: 'ACTION', from: 'checkout', to: 'pay' });
    });

    test('owner reads the event', async () => {
      const res = await api(server, 'GET', `/api/events/${event.id}`, undefined, alice.token);
      expect(res.status).toBe(200);
      expect((await json<{ event: EventBody }>(res)).event.id).toBe(event.id);
    });

    test('another principal is forbidden', async () => {
      const res = await api(server, 'GET', `/api/events/${event.id}`, undefined, bob.token);
      expect(res.status).toBe(403);
      expect(await json(res)).toEqual({
        error: 'Access denied: resource belongs to another principal',
        resourceId: event.id,
      });
    });

    test('an unused id is not found', async () => {
      const res = await api(server, 'GET', `/api/events/${UNUSED_ID}`, undefined, alice.token);
      expect(res.status).toBe(404);
      expect(await json(res)).toEqual({ error: 'Resource not found', resourceId: UNUSED_ID });
    });

    test('no token is unauthenticated', async () => {
      const res = await api(server, 'GET', `/api/events/${event.id}`);
      expect(res.status).toBe(401);
    });
  });

  describe('List', () => {
    let server2: TestServer;
    let carol: RegisteredUser;
    let dave: RegisteredUser;

    beforeAll(async () => {
      server2 = await startTestServer();
      carol = await signUp(server2, 'carol');
      dave = await signUp(server2, 'dave');
      for (let i = 0; i < 5; i++) {
        await api(server2, 'POST', '/api/events', { type: 'ACTION', from: `c${i}`, to: 'x' }, carol.token);
        await api(server2, 'POST', '/api/events', { type: 'ACTION', from: `d${i}`, to: 'x' }, dave.token);
      }
    });

    afterAll(async () => {
      await server2.close();
    });

    test('returns only the caller\'s events', async () => {
      const res = await api(server2, 'GET', '/api/events', undefined, carol.token);
      expect(res.status).toBe(200);
      const body = await json<PageBody>(res);
      expect(body.total).toBe(5);
      expect(body.items).toHaveLength(5);
      expect(body.items.every((item) => item.ownerId === carol.id)).toBe(true);
    });

    test('pages after filtering by owner', async () => {
      const res = await api(server2, 'GET', '/api/events?page=2&size=2', undefined, carol.token);
      const body = await json<PageBody>(res);
      expect(body).toMatchObject({ page: 2, size: 2, total: 5, totalPages: 3 });
      expect(body.items).toHaveLength(1);
      expect(body.items[0].ownerId).toBe(carol.id);
    });

    test('rejects a negative page', async () => {
      const res = await api(server2, 'GET', '/api/events?page=-1', undefined, carol.token);
      expect(res.status).toBe(400);
      expect(await json(res)).toEqual({ error: 'page must be an integer from 0 to 2147483647' });
    });

    test('rejects a page index beyond the offset range', async () => {
      const res = await api(server2, 'GET', '/api/events?page=1e20', undefined, carol.token);
      expect(res.status).toBe(400);
      expect(await json(res)).toEqual({ error: 'page must be an integer from 0 to 2147483647' });
    });

    test('accepts the largest page index and returns an empty page', async () => {
      const res = await api(server2, 'GET', '/api/events?page=2147483647&size=1', undefined, carol.token);
      expect(res.status).toBe(200);
      expect(await json<PageBody>(res)).toMatchObject({ items: [], page: 2147483647, size: 1, total: 5 });
    });
  });

  describe('Update', () => {
    let event: EventBody;

    beforeAll(async () => {
      event = await createEvent(alice, { type: 'NAVIGATION', from: '/a', to: '/b' });
    });

    test('owner changes the client fields', async () => {
      const res = await api(server, 'PUT', `/api/events/${event.id}`, { to: '/c', ownerId: bob.id }, alice.token);
      expect(res.status).toBe(200);
      const updated = (await json<{ event: EventBody }>(res)).event;
      expect(updated).toMatchObject({ id: event.id, ownerId: alice.id, from: '/a', to: '/c', updatedBy: alice.id });
    });

    test('another principal is forbidden and nothing changes', async () => {
      const res = await api(server, 'PUT', `/api/events/${event.id}`, { to: '/hijacked' }, bob.token);
      expect(res.status).toBe(403);
      await expect(server.events.findById(event.id)).resolves.toMatchObject({ to: '/c' });
    });
  });

  describe('Delete', () => {
    let event: EventBody;

    beforeAll(async () => {
      event = await createEvent(alice, { type: 'ACTION', from: 'x', to: 'y' });
    });

    test('another principal is forbidden', async () => {
      const res = await api(server, 'DELETE', `/api/events/${event.id}`, undefined, bob.token);
      expect(res.status).toBe(403);
    });

    test('owner soft deletes', async () => {
      const res = await api(server, 'DELETE', `/api/events/${event.id}`, undefined, alice.token);
      expect(res.status).toBe(204);

      const stored = await server.events.findByIdIncludingDeleted(event.id);
      expect(stored?.deletedBy).toBe(alice.id);
      expect(stored?.deletedAt).toBeInstanceOf(Date);
    });

    test('deleted event is no longer readable', async () => {
      const res = await api(server, 'GET', `/api/events/${event.id}`, undefined, alice.token);
      expect(res.status).toBe(404);
    });

    test('deleted event is no longer listed', async () => {
      const res = await api(server, 'GET', '/api/events?size=100', undefined, alice.token);
      const body = await json<PageBody>(res);
      expect(body.items.map((item) => item.id)).not.toContain(event.id);
    });

    test('deleting again is not found', async () => {
      const res = await api(server, 'DELETE', `/api/events/${event.id}`, undefined, alice.token);
      expect(res.status).toBe(404);
    });
  });
});
