// src/services/authService.ts
import bcryptjs from 'bcryptjs';
import { getConfig } from '../config';
import { runInTransaction } from '../database';
import {
  DuplicateIdentityError,
  InvalidCredentialsError,
  InvalidInputError,
  InvalidTokenError,
  MissingCredentialsError,
  RefreshDeniedError,
  UnknownIdentityError,
  WeakCredentialError,
} from '../errors/authErrors';
import { TokenType } from '../models/token.types';
import { isRole, toUserSummary, User, UserSummary } from '../models/user.types';
import logger from '../utils/logger';
import { logSafeError } from '../utils/safeLogger';
import { extractIdentity, isTokenExpired, isTokenValid, issueToken } from './jwtService';
import {
  deleteToken,
  findAllTokens,
  findAllValidAccessTokensByUser,
  saveAllTokens,
  saveToken,
} from './tokenService';
import { createUser, findUserByEmail, findUserById } from './userService';

export const MIN_PASSWORD_LENGTH = 8;

export interface RegisterInput {
  email?: string;
  password?: string;
  firstName?: string;
  lastName?: string;
  role?: string;
}

export interface AuthResponse {
  accessToken: string;
  refreshToken: string;
  user: UserSummary;
}

export interface RefreshResponse {
  accessToken: string;
  refreshToken: string;
}

let dummyPasswordHash: Promise<string> | undefined;

// Hashed once, with the configured cost, on the first login for an unknown email.
const getDummyPasswordHash = (): Promise<string> => {
  if (!dummyPasswordHash) {
    dummyPasswordHash = bcryptjs.hash('unknown-identity-placeholder', getConfig().bcryptSaltRounds);
  }
  return dummyPasswordHash;
};

// A failed token insert must not abort the surrounding flow: the caller still gets usable tokens.
const saveUserToken = (user: User, token: string, tokenType: TokenType): void => {
  try {
    saveToken({ user_id: user.id, token, token_type: tokenType });
  } catch (error) {
    logSafeError(logger, `Failed to persist ${tokenType} token for user ${user.id}`, error);
  }
};

/**
 * Deletes every stored token the codec reports as expired (malformed ones included).
 * Returns the number of records removed.
 */
export const sweepExpiredTokens = (): number => {
  const expired = findAllTokens().filter((record) => isTokenExpired(record.token));
  let removed = 0;
  for (const record of expired) {
    if (deleteToken(record)) {
      removed++;
    }
  }
  if (removed > 0) {
    logger.info(`Swept ${removed} expired token(s).`);
  }
  return removed;
};

// Marks every non-revoked access token of the user as revoked. Returns how many were revoked.
export const revokeAllUserAccessTokens = (user: Pick<User, 'id'>): number => {
  const validUserTokens = findAllValidAccessTokensByUser(user.id);
  if (validUserTokens.length === 0) {
    return 0;
  }
  saveAllTokens(validUserTokens.map((record) => ({ ...record, revoked: true })));
  return validUserTokens.length;
};

export const register = async (input: RegisterInput): Promise<AuthResponse> => {
  const { email, password } = input;

  // An empty string is a (weak) password, not a missing one.
  if (email === undefined || password === undefined) {
    throw new MissingCredentialsError();
  }
  if (password.length < MIN_PASSWORD_LENGTH) {
    throw new WeakCredentialError(`Password must be at least ${MIN_PASSWORD_LENGTH} characters long.`);
  }
  if (!email.includes('@') || email.length < 5) {
    throw new InvalidInputError('Invalid email format.');
  }

  const role = input.role ?? 'BUYER';
  if (!isRole(role)) {
    throw new InvalidInputError(`Unknown role: ${role}.`);
  }

  if (findUserByEmail(email)) {
    throw new DuplicateIdentityError();
  }

  const passwordHash = await bcryptjs.hash(password, getConfig().bcryptSaltRounds);

  // createUser maps a lost registration race to DuplicateIdentityError.
  const user = createUser({
    email,
    passwordHash,
    firstName: input.firstName ?? '',
    lastName: input.lastName ?? '',
    role,
  });

  const accessToken = issueToken(user, 'ACCESS');
  const refreshToken = issueToken(user, 'REFRESH');
  saveUserToken(user, accessToken, 'ACCESS');
  saveUserToken(user, refreshToken, 'REFRESH');

  logger.info(`User registered: ${user.email} (ID: ${user.id})`);
  return { accessToken, refreshToken, user: toUserSummary(user) };
};

export const authenticate = async (email?: string, password?: string): Promise<AuthResponse> => {
  sweepExpiredTokens();

  if (!email || !password) {
    throw new MissingCredentialsError();
  }

  const user = findUserByEmail(email);
  if (!user) {
    // Same bcrypt cost as a wrong password, so response time does not reveal registered emails.
    await bcryptjs.compare(password, await getDummyPasswordHash());
    throw new UnknownIdentityError('No user found with this email. Please try again.');
  }

  const isMatch = await bcryptjs.compare(password, user.passwordHash);
  if (!isMatch) {
    throw new InvalidCredentialsError('Incorrect email or password. Please try again.');
  }

  const accessToken = issueToken(user, 'ACCESS');
  const refreshToken = issueToken(user, 'REFRESH');

  const revoked = runInTransaction(() => {
    const count = revokeAllUserAccessTokens(user);
    saveUserToken(user, accessToken, 'ACCESS');
    saveUserToken(user, refreshToken, 'REFRESH');
    return count;
  });

  logger.info(`User logged in: ${user.email} (revoked ${revoked} access token(s))`);
  return { accessToken, refreshToken, user: toUserSummary(user) };
};

/**
 * Mints a new access token from a refresh token. The refresh token itself is returned unchanged.
 * Throws RefreshDeniedError without a token, InvalidTokenError when it is unverifiable,
 * expired, not a refresh token or bound to another user.
 */
export const refresh = (refreshToken?: string): RefreshResponse => {
  if (!refreshToken) {
    throw new RefreshDeniedError();
  }

  const identity = extractIdentity(refreshToken);
  const user = findUserById(identity.userId);
  if (!user) {
    throw new UnknownIdentityError('No user found for this refresh token.');
  }

  if (identity.type !== 'REFRESH' || !isTokenValid(refreshToken, user)) {
    logger.warn(`Rejected refresh attempt for user ${user.id}`);
    throw new InvalidTokenError('Refresh token is expired or invalid.');
  }

  const accessToken = issueToken(user, 'ACCESS');
  sweepExpiredTokens();
  saveUserToken(user, accessToken, 'ACCESS');

  logger.info(`Token refreshed for ${user.email}`);
  return { accessToken, refreshToken };
};

// Identity comes from the verified bearer token, never from ambient request state.
export const getUserSummary = (userId: string): UserSummary => {
  const user = findUserById(userId);
  if (!user) {
    throw new UnknownIdentityError();
  }
  return toUserSummary(user);
};
