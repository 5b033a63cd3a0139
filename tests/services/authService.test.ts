// tests/services/authService.test.ts
import bcryptjs from 'bcryptjs';
import { db } from '../../src/database';
import {
  DuplicateIdentityError,
  InvalidCredentialsError,
  InvalidInputError,
  InvalidTokenError,
  MissingCredentialsError,
  RefreshDeniedError,
  UnknownIdentityError,
  WeakCredentialError,
} from '../../src/errors/authErrors';
import * as authService from '../../src/services/authService';
import { extractIdentity, isTokenExpired, resetClock, setClock } from '../../src/services/jwtService';
import * as tokenService from '../../src/services/tokenService';
import { findAllTokens, findTokenByValue, findTokensByUserId, saveToken } from '../../src/services/tokenService';
import { deleteUser, findUserByEmail, getAllUsers } from '../../src/services/userService';
import logger from '../../src/utils/logger';

const ISSUED_AT_MS = 1_700_000_000_000;

const registerAlice = () =>
  authService.register({
    email: 'a@x.com',
    password: 'password123',
    firstName: 'Alice',
    lastName: 'Anders',
    role: 'SELLER',
  });

beforeEach(() => {
  db.exec('DELETE FROM tokens;');
  db.exec('DELETE FROM users;');
});

afterEach(() => {
  resetClock();
  jest.restoreAllMocks();
});

const failTokenInserts = () =>
  jest.spyOn(tokenService, 'saveToken').mockImplementation(() => {
    throw new Error('disk full');
  });

describe('Authentication Service', () => {
  describe('register', () => {
    it('should create the user and return an access/refresh pair bound to it', async () => {
      const result = await registerAlice();

      expect(result.user).toEqual({
        id: expect.any(String),
        firstName: 'Alice',
        lastName: 'Anders',
        email: 'a@x.com',
        role: 'SELLER',
      });
      expect(extractIdentity(result.accessToken)).toEqual({ userId: result.user.id, email: 'a@x.com', type: 'ACCESS' });
      expect(extractIdentity(result.refreshToken)).toEqual({ userId: result.user.id, email: 'a@x.com', type: 'REFRESH' });
      expect(isTokenExpired(result.accessToken)).toBe(false);
      expect(isTokenExpired(result.refreshToken)).toBe(false);
    });

    it('should persist one ACCESS and one REFRESH record', async () => {
      const result = await registerAlice();

      const records = findTokensByUserId(result.user.id);
      expect(records.map((t) => [t.token_type, t.token, t.revoked])).toEqual([
        ['ACCESS', result.accessToken, false],
        ['REFRESH', result.refreshToken, false],
      ]);
    });

    it('should store only a bcrypt hash of the password', async () => {
      await registerAlice();

      const stored = findUserByEmail('a@x.com');
      expect(stored?.passwordHash).not.toBe('password123');
      expect(bcryptjs.compareSync('password123', stored?.passwordHash ?? '')).toBe(true);
    });

    it('should default the role to BUYER', async () => {
      const result = await authService.register({ email: 'b@x.com', password: 'password123' });
      expect(result.user.role).toBe('BUYER');
      expect(result.user.firstName).toBe('');
    });

    it('should reject a second registration with the same email', async () => {
      await registerAlice();
      await expect(registerAlice()).rejects.toThrow(DuplicateIdentityError);
      expect(getAllUsers()).toHaveLength(1);
    });

    it('should surface DuplicateIdentityError for the loser of a concurrent registration', async () => {
      const results = await Promise.allSettled([registerAlice(), registerAlice()]);

      expect(results.filter((r) => r.status === 'fulfilled')).toHaveLength(1);
      const rejected = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
      expect(rejected?.reason).toBeInstanceOf(DuplicateIdentityError);
      expect(getAllUsers()).toHaveLength(1);
    });

    it.each(['', 'a', 'short', 'seven77'])('should reject the %p password as weak and persist nothing', async (password) => {
      await expect(authService.register({ email: 'weak@x.com', password })).rejects.toThrow(WeakCredentialError);
      expect(getAllUsers()).toHaveLength(0);
    });

    it('should report a weak password before a malformed email', async () => {
      await expect(authService.register({ email: 'bad', password: 'short' })).rejects.toThrow(WeakCredentialError);
      await expect(authService.register({ email: '', password: '' })).rejects.toThrow(WeakCredentialError);
    });

    it('should treat an empty email with a strong password as malformed, not missing', async () => {
      await expect(authService.register({ email: '', password: 'password123' })).rejects.toThrow('Invalid email format.');
    });

    it('should still return both tokens when persisting them fails', async () => {
      failTokenInserts();

      const result = await registerAlice();

      expect(extractIdentity(result.accessToken).userId).toBe(result.user.id);
      expect(extractIdentity(result.refreshToken).userId).toBe(result.user.id);
      expect(findTokensByUserId(result.user.id)).toEqual([]);
      expect(logger.error).toHaveBeenCalledWith(
        `Failed to persist ACCESS token for user ${result.user.id}`,
        expect.objectContaining({ errorName: 'Error', errorMessage: 'disk full' })
      );
      expect(logger.error).toHaveBeenCalledWith(
        `Failed to persist REFRESH token for user ${result.user.id}`,
        expect.objectContaining({ errorMessage: 'disk full' })
      );
    });

    it('should accept a password of exactly 8 characters', async () => {
      await expect(authService.register({ email: 'eight@x.com', password: '12345678' })).resolves.toBeDefined();
    });

    it('should reject missing credentials, bad email format and unknown roles', async () => {
      await expect(authService.register({ password: 'password123' })).rejects.toThrow(MissingCredentialsError);
      await expect(authService.register({ email: 'nope', password: 'password123' })).rejects.toThrow('Invalid email format.');
      await expect(authService.register({ email: 'r@x.com', password: 'password123', role: 'OWNER' }))
        .rejects.toThrow(InvalidInputError);
      expect(getAllUsers()).toHaveLength(0);
    });
  });

  describe('authenticate', () => {
    beforeEach(async () => {
      await registerAlice();
    });

    it('should return a fresh token pair for valid credentials', async () => {
      const result = await authService.authenticate('a@x.com', 'password123');

      expect(result.user.email).toBe('a@x.com');
      expect(extractIdentity(result.accessToken).userId).toBe(result.user.id);
      expect(extractIdentity(result.refreshToken).userId).toBe(result.user.id);
      expect(isTokenExpired(result.accessToken)).toBe(false);
    });

    it('should fail with MissingCredentialsError when a field is absent', async () => {
      await expect(authService.authenticate('a@x.com', undefined)).rejects.toThrow(MissingCredentialsError);
      await expect(authService.authenticate(undefined, 'password123')).rejects.toThrow(MissingCredentialsError);
    });

    it('should fail with UnknownIdentityError for an unknown email', async () => {
      await expect(authService.authenticate('nobody@x.com', 'password123')).rejects.toThrow(UnknownIdentityError);
    });

    it('should run one bcrypt comparison for an unknown email, as for a wrong password', async () => {
      const compare = jest.spyOn(bcryptjs, 'compare');

      await expect(authService.authenticate('nobody@x.com', 'password123')).rejects.toThrow(UnknownIdentityError);
      expect(compare).toHaveBeenCalledTimes(1);
      expect(compare).toHaveBeenCalledWith('password123', expect.stringMatching(/^\$2[aby]\$04\$/));

      compare.mockClear();
      await expect(authService.authenticate('a@x.com', 'wrong-password')).rejects.toThrow(InvalidCredentialsError);
      expect(compare).toHaveBeenCalledTimes(1);
    });

    it('should fail with InvalidCredentialsError for a wrong password', async () => {
      await expect(authService.authenticate('a@x.com', 'wrong-password')).rejects.toThrow(InvalidCredentialsError);
    });

    it('should revoke the access token of the previous login', async () => {
      const first = await authService.authenticate('a@x.com', 'password123');
      const second = await authService.authenticate('a@x.com', 'password123');

      expect(findTokenByValue(first.accessToken)?.revoked).toBe(true);
      expect(findTokenByValue(second.accessToken)?.revoked).toBe(false);
      expect(findTokenByValue(first.refreshToken)?.revoked).toBe(false);
    });

    it('should also revoke the access token issued at registration', async () => {
      const registered = findTokensByUserId(findUserByEmail('a@x.com')?.id ?? '');
      await authService.authenticate('a@x.com', 'password123');

      const registrationAccess = registered.find((t) => t.token_type === 'ACCESS');
      expect(findTokenByValue(registrationAccess?.token ?? '')?.revoked).toBe(true);
    });

    it('should sweep expired tokens before logging in', async () => {
      saveToken({ user_id: findUserByEmail('a@x.com')?.id ?? '', token: 'garbage', token_type: 'ACCESS' });

      await authService.authenticate('a@x.com', 'password123');

      expect(findTokenByValue('garbage')).toBeUndefined();
    });

    it('should commit the revocation even when the new tokens cannot be stored', async () => {
      const userId = findUserByEmail('a@x.com')?.id ?? '';
      const registrationAccess = findTokensByUserId(userId).find((t) => t.token_type === 'ACCESS');
      failTokenInserts();

      const result = await authService.authenticate('a@x.com', 'password123');

      expect(result.user.id).toBe(userId);
      expect(findTokenByValue(registrationAccess?.token ?? '')?.revoked).toBe(true);
      expect(findTokenByValue(result.accessToken)).toBeUndefined();
      expect(findTokensByUserId(userId)).toHaveLength(2);
    });

    it('should leave stored tokens untouched when the password is wrong', async () => {
      const before = findAllTokens();
      await expect(authService.authenticate('a@x.com', 'wrong-password')).rejects.toThrow(InvalidCredentialsError);
      expect(findAllTokens()).toEqual(before);
    });
  });

  describe('refresh', () => {
    it('should fail with RefreshDeniedError when no token is supplied', () => {
      expect(() => authService.refresh(undefined)).toThrow(RefreshDeniedError);
      expect(() => authService.refresh('')).toThrow(RefreshDeniedError);
    });

    it('should mint and persist a new access token and return the same refresh token', async () => {
      const registered = await registerAlice();

      const result = authService.refresh(registered.refreshToken);

      expect(result.refreshToken).toBe(registered.refreshToken);
      expect(result.accessToken).not.toBe(registered.accessToken);
      expect(extractIdentity(result.accessToken)).toEqual({ userId: registered.user.id, email: 'a@x.com', type: 'ACCESS' });

      const records = findTokensByUserId(registered.user.id);
      expect(records).toHaveLength(3);
      expect(records[2]).toMatchObject({ token: result.accessToken, token_type: 'ACCESS', revoked: false });
    });

    it('should issue nothing for an expired refresh token', async () => {
      setClock(() => ISSUED_AT_MS);
      const registered = await registerAlice();

      setClock(() => ISSUED_AT_MS + 86_400_000);
      expect(() => authService.refresh(registered.refreshToken)).toThrow(InvalidTokenError);
      expect(findTokensByUserId(registered.user.id)).toHaveLength(2);
    });

    it('should reject an access token presented as a refresh token', async () => {
      const registered = await registerAlice();
      expect(() => authService.refresh(registered.accessToken)).toThrow('Refresh token is expired or invalid.');
    });

    it('should sweep expired tokens before storing the new access token', async () => {
      const registered = await registerAlice();
      saveToken({ user_id: registered.user.id, token: 'not-a-jwt', token_type: 'ACCESS' });
      const deleteSpy = jest.spyOn(tokenService, 'deleteToken');
      const saveSpy = jest.spyOn(tokenService, 'saveToken');

      const result = authService.refresh(registered.refreshToken);

      expect(deleteSpy).toHaveBeenCalledTimes(1);
      expect(deleteSpy).toHaveBeenCalledWith(expect.objectContaining({ token: 'not-a-jwt' }));
      expect(saveSpy).toHaveBeenCalledTimes(1);
      expect(deleteSpy.mock.invocationCallOrder[0]).toBeLessThan(saveSpy.mock.invocationCallOrder[0]);
      expect(findTokenByValue('not-a-jwt')).toBeUndefined();
      expect(findTokenByValue(result.accessToken)?.token_type).toBe('ACCESS');
    });

    it('should reject a malformed token', () => {
      expect(() => authService.refresh('garbage')).toThrow(InvalidTokenError);
    });

    it('should fail with UnknownIdentityError when the user no longer exists', async () => {
      const registered = await registerAlice();
      deleteUser(registered.user.id);
      expect(() => authService.refresh(registered.refreshToken)).toThrow(UnknownIdentityError);
    });
  });

  describe('sweepExpiredTokens', () => {
    it('should delete a token once the clock passes its expiry, and be idempotent', async () => {
      setClock(() => ISSUED_AT_MS);
      const registered = await registerAlice();
      expect(authService.sweepExpiredTokens()).toBe(0);

      setClock(() => ISSUED_AT_MS + 901_000);
      expect(authService.sweepExpiredTokens()).toBe(1);
      expect(authService.sweepExpiredTokens()).toBe(0);

      expect(findTokensByUserId(registered.user.id).map((t) => t.token)).toEqual([registered.refreshToken]);
    });

    it('should delete malformed tokens', async () => {
      const registered = await registerAlice();
      saveToken({ user_id: registered.user.id, token: 'not-a-jwt', token_type: 'REFRESH' });

      expect(authService.sweepExpiredTokens()).toBe(1);
      expect(findTokenByValue('not-a-jwt')).toBeUndefined();
    });
  });

  describe('revokeAllUserAccessTokens', () => {
    it('should revoke active access tokens only, once', async () => {
      const registered = await registerAlice();

      expect(authService.revokeAllUserAccessTokens(registered.user)).toBe(1);
      expect(authService.revokeAllUserAccessTokens(registered.user)).toBe(0);

      expect(findTokenByValue(registered.accessToken)?.revoked).toBe(true);
      expect(findTokenByValue(registered.refreshToken)?.revoked).toBe(false);
    });
  });

  describe('getUserSummary', () => {
    it('should return the summary for a known id and fail for an unknown one', async () => {
      const registered = await registerAlice();
      expect(authService.getUserSummary(registered.user.id)).toEqual(registered.user);
      expect(() => authService.getUserSummary('missing')).toThrow(UnknownIdentityError);
    });
  });
});
