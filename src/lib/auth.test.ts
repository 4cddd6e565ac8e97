import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { RecordStore } from '../db/store';
import { AuthService } from './auth';
import {
  ConflictError,
  InvalidCredentialsError,
  InvalidTokenError,
  MissingCredentialError,
  PrincipalNotFoundError,
  ValidationError,
  WeakPasswordError,
} from './errors';
import { TokenService } from './token';

describe('AuthService', () => {
  let dataDir: string;
  let store: RecordStore;
  let tokens: TokenService;
  let auth: AuthService;

  beforeEach(async () => {
    dataDir = await mkdtemp(path.join(tmpdir(), 'auth-service-'));
    store = new RecordStore(dataDir);
    await store.initialize();
    tokens = new TokenService({
      secret: 'test-secret',
      algorithm: 'HS256',
      expireMinutes: 60,
    });
    auth = new AuthService(store, tokens, 1000);
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  describe('signup', () => {
    it('creates the first user with id 1 and hides the hash', async () => {
      const user = await auth.signup('alice', 'secret1');

      expect(user.id).toBe(1);
      expect(user.username).toBe('alice');
      expect(Object.keys(user).sort()).toEqual(['createdAt', 'id', 'username']);

      const stored = await store.findUserByUsername('alice');
      expect(stored?.passwordHash).toMatch(/^\$pbkdf2-sha256\$1000\$/);
    });

    it('rejects a duplicate username and keeps a single row', async () => {
      await auth.signup('alice', 'secret1');

      await expect(auth.signup('alice', 'other12')).rejects.toBeInstanceOf(
        ConflictError,
      );
      const users = await store.listUsers();
      expect(users.filter((user) => user.username === 'alice')).toHaveLength(1);
    });

    it('treats usernames case-sensitively', async () => {
      await auth.signup('alice', 'secret1');

      expect((await auth.signup('Alice', 'secret1')).id).toBe(2);
    });

    it('lets only one of several concurrent signups for a name succeed', async () => {
      const results = await Promise.allSettled(
        Array.from({ length: 5 }, () => auth.signup('alice', 'secret1')),
      );

      const fulfilled = results.filter((r) => r.status === 'fulfilled');
      const rejected = results.filter(
        (r): r is PromiseRejectedResult => r.status === 'rejected',
      );
      expect(fulfilled).toHaveLength(1);
      expect(rejected).toHaveLength(4);
      for (const result of rejected) {
        expect(result.reason).toBeInstanceOf(ConflictError);
      }
      expect(await store.listUsers()).toHaveLength(1);
    });

    it('trims the username and password', async () => {
      const user = await auth.signup('  bob  ', '  secret1 ');

      expect(user.username).toBe('bob');
      await expect(auth.login('bob', 'secret1')).resolves.toMatchObject({
        user: { username: 'bob' },
      });
    });

    it('requires a username', async () => {
      await expect(auth.signup('   ', 'secret1')).rejects.toThrow(
        new ValidationError('Username is required'),
      );
    });

    it.each(['abc', '     abcde   '])(
      'rejects the weak password %j before storing anything',
      async (password) => {
        await expect(auth.signup('alice', password)).rejects.toBeInstanceOf(
          WeakPasswordError,
        );
        expect(await store.listUsers()).toEqual([]);
      },
    );
  });

  describe('login', () => {
    beforeEach(async () => {
      await auth.signup('alice', 'secret1');
    });

    it('issues a token for the right password', async () => {
      const result = await auth.login('alice', 'secret1');

      expect(result.expiresIn).toBe(3600);
      expect(result.user).toMatchObject({ id: 1, username: 'alice' });
      expect(await tokens.verify(result.token)).toBe('alice');
    });

    it('rejects a wrong password', async () => {
      await expect(auth.login('alice', 'secret2')).rejects.toBeInstanceOf(
        InvalidCredentialsError,
      );
    });

    it('answers an unknown user exactly like a wrong password', async () => {
      const wrongPassword = await auth.login('alice', 'secret2').catch((e) => e);
      const unknownUser = await auth.login('nobody', 'secret1').catch((e) => e);

      expect(unknownUser).toBeInstanceOf(InvalidCredentialsError);
      expect(unknownUser.message).toBe(wrongPassword.message);
      expect(unknownUser.status).toBe(401);
    });

    it('requires both fields', async () => {
      await expect(auth.login(' ', 'secret1')).rejects.toBeInstanceOf(
        ValidationError,
      );
      await expect(auth.login('alice', '  ')).rejects.toBeInstanceOf(
        ValidationError,
      );
    });
  });

  describe('authenticate', () => {
    it('fails without a credential', async () => {
      await expect(auth.authenticate(undefined)).rejects.toBeInstanceOf(
        MissingCredentialError,
      );
      await expect(auth.authenticate('')).rejects.toBeInstanceOf(
        MissingCredentialError,
      );
    });

    it('fails on an invalid token', async () => {
      await expect(auth.authenticate('garbage')).rejects.toBeInstanceOf(
        InvalidTokenError,
      );
    });

    it('fails when the user no longer exists', async () => {
      const { token } = await tokens.issue('ghost');

      await expect(auth.authenticate(token)).rejects.toBeInstanceOf(
        PrincipalNotFoundError,
      );
    });

    it('resolves a valid token to the identity', async () => {
      await auth.signup('alice', 'secret1');
      const { token } = await auth.login('alice', 'secret1');

      const identity = await auth.authenticate(token);
      expect(identity).toMatchObject({ id: 1, username: 'alice' });
      expect(identity).not.toHaveProperty('passwordHash');
    });
  });
});
