// =============================================================================
// TRACKWELL — Test Suite 04: Request Authenticator
// =============================================================================

import { TokenCodec } from '../src/auth/token-codec';
import { PrincipalStore, createPrincipalStore } from '../src/auth/principal-store';
import { createRequestAuthenticator } from '../src/auth/request-authenticator';
import { SecurityContext } from '../src/auth/security-context';
import { createInMemoryUserRepository, UserRepository } from '../src/repositories/user.repository';
import { Credential } from '../src/types/auth';
import { PrincipalNotFound } from '../src/types/errors';

const SECRET = 'test-secret';
const T0 = 1_700_000_000_000;
const TTL = 60_000;
const ALICE_ID = '11111111-1111-4111-8111-111111111111';

describe('RequestAuthenticator', () => {
  let clock: number;
  let codec: TokenCodec;
  let users: UserRepository;
  let principals: PrincipalStore;
  let context: SecurityContext;
  let warn: jest.SpyInstance;
  let error: jest.SpyInstance;

  beforeEach(async () => {
    clock = T0;
    codec = new TokenCodec({ secret: SECRET, ttlMs: TTL, now: () => clock });
    users = createInMemoryUserRepository();
    await users.insert({
      id: ALICE_ID,
      username: 'alice',
      email: 'alice@example.com',
      passwordHash: 'not-a-real-hash',
      createdAt: new Date(T0),
      createdBy: null,
      updatedAt: new Date(T0),
      updatedBy: null,
    });
    principals = createPrincipalStore(users);
    context = new SecurityContext();
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warn.mockRestore();
    error.mockRestore();
  });

  function authenticator(store: PrincipalStore = principals) {
    return createRequestAuthenticator({ codec, principals: store });
  }

  test('valid bearer token installs the principal', async () => {
    const outcome = await authenticator().authenticate(`Bearer ${codec.issue({ username: 'alice' })}`, context);

    expect(outcome).toEqual({ status: 'authenticated', principal: { id: ALICE_ID, username: 'alice' } });
    expect(context.current()).toEqual({ id: ALICE_ID, username: 'alice' });
    expect(Object.isFrozen(context.current())).toBe(true);
  });

  test('missing header leaves the context empty', async () => {
    const outcome = await authenticator().authenticate(undefined, context);
    expect(outcome).toEqual({ status: 'anonymous', reason: 'missing_header' });
    expect(context.current()).toBeNull();
  });

  test('non-Bearer scheme leaves the context empty without decoding', async () => {
    const parse = jest.spyOn(codec, 'parseSubject');
    const outcome = await authenticator().authenticate('Basic YWxpY2U6c2VjcmV0', context);

    expect(outcome).toEqual({ status: 'anonymous', reason: 'unsupported_scheme' });
    expect(parse).not.toHaveBeenCalled();
    expect(context.current()).toBeNull();
  });

  test('garbage token is logged and absorbed', async () => {
    const loadByUsername = jest.fn<Promise<Credential>, [string]>();
    const outcome = await authenticator({ loadByUsername }).authenticate('Bearer abc.def', context);

    expect(outcome).toEqual({ status: 'anonymous', reason: 'malformed_token' });
    expect(loadByUsername).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('[Auth] Rejected bearer token:', 'Malformed token: jwt malformed');
    expect(context.current()).toBeNull();
  });

  test('empty bearer token is malformed', async () => {
    const outcome = await authenticator().authenticate('Bearer ', context);
    expect(outcome).toEqual({ status: 'anonymous', reason: 'malformed_token' });
  });

  test('already authenticated context skips re-authentication', async () => {
    context.install({ id: 'existing-id', username: 'existing' });
    const loadByUsername = jest.fn<Promise<Credential>, [string]>();
    const isValid = jest.spyOn(codec, 'isValid');

    const outcome = await authenticator({ loadByUsername }).authenticate(
      `Bearer ${codec.issue({ username: 'alice' })}`,
      context
    );

    expect(outcome).toEqual({
      status: 'already_authenticated',
      principal: { id: 'existing-id', username: 'existing' },
    });
    expect(loadByUsername).not.toHaveBeenCalled();
    expect(isValid).not.toHaveBeenCalled();
    expect(context.current()).toEqual({ id: 'existing-id', username: 'existing' });
  });

  test('subject that no longer resolves leaves the context empty', async () => {
    const outcome = await authenticator().authenticate(`Bearer ${codec.issue({ username: 'ghost' })}`, context);
    expect(outcome).toEqual({ status: 'anonymous', reason: 'unknown_principal' });
    expect(context.current()).toBeNull();
  });

  test('soft-deleted principal no longer authenticates', async () => {
    const token = codec.issue({ username: 'alice' });
    await users.markDeleted(ALICE_ID, { deletedAt: new Date(T0), deletedBy: ALICE_ID });

    const outcome = await authenticator().authenticate(`Bearer ${token}`, context);
    expect(outcome).toEqual({ status: 'anonymous', reason: 'unknown_principal' });
  });

  test('store failure degrades to anonymous instead of failing the request', async () => {
    const failing: PrincipalStore = {
      loadByUsername: () => Promise.reject(new Error('connection refused')),
    };
    const outcome = await authenticator(failing).authenticate(
      `Bearer ${codec.issue({ username: 'alice' })}`,
      context
    );

    expect(outcome).toEqual({ status: 'anonymous', reason: 'lookup_failed' });
    expect(error).toHaveBeenCalledWith('[Auth] Principal lookup failed:', 'connection refused');
    expect(context.current()).toBeNull();
  });

  test('expired token for a resolvable principal is invalid', async () => {
    const token = codec.issue({ username: 'alice' });
    clock = T0 + TTL;

    const outcome = await authenticator().authenticate(`Bearer ${token}`, context);
    expect(outcome).toEqual({ status: 'anonymous', reason: 'invalid_token' });
    expect(context.current()).toBeNull();
  });

  test('PrincipalStore reports absent usernames with PrincipalNotFound', async () => {
    await expect(principals.loadByUsername('ghost')).rejects.toThrow(PrincipalNotFound);
    await expect(principals.loadByUsername('alice')).resolves.toMatchObject({ id: ALICE_ID });
  });
});

describe('SecurityContext', () => {
  test('starts empty', () => {
    const context = new SecurityContext();
    expect(context.current()).toBeNull();
    expect(context.isAuthenticated).toBe(false);
  });

  test('is write-once per request', () => {
    const context = new SecurityContext();
    context.install({ id: 'a', username: 'alice' });
    expect(context.isAuthenticated).toBe(true);
    expect(() => context.install({ id: 'b', username: 'bob' })).toThrow(
      'Security context already holds a principal for this request'
    );
    expect(context.current()).toEqual({ id: 'a', username: 'alice' });
  });

  test('separate contexts do not share state', () => {
    const first = new SecurityContext();
    const second = new SecurityContext();
    first.install({ id: 'a', username: 'alice' });
    expect(second.current()).toBeNull();
  });
});
