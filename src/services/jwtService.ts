// src/services/jwtService.ts
import jsonwebtoken, { JwtPayload } from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import { getConfig } from '../config';
import { InvalidTokenError } from '../errors/authErrors';
import { isTokenType, TokenType } from '../models/token.types';
import { User } from '../models/user.types';
import logger from '../utils/logger';

const ALGORITHM = 'HS256';

export type Clock = () => number; // milliseconds since epoch

const systemClock: Clock = () => Date.now();
let clock: Clock = systemClock;

// Lets tests move time forward without touching the global timers.
export const setClock = (next: Clock): void => {
  clock = next;
};

export const resetClock = (): void => {
  clock = systemClock;
};

const nowInSeconds = (): number => Math.floor(clock() / 1000);

interface TokenClaims extends JwtPayload {
  sub: string;
  email: string;
  type: TokenType;
}

export interface TokenIdentity {
  userId: string;
  email: string;
  type: TokenType;
}

const isTokenClaims = (payload: JwtPayload): payload is TokenClaims =>
  typeof payload.sub === 'string' && typeof payload.email === 'string' && isTokenType(payload.type);

const verifyClaims = (token: string, ignoreExpiration: boolean): TokenClaims => {
  const decoded = jsonwebtoken.verify(token, getConfig().jwtSecret, {
    algorithms: [ALGORITHM],
    ignoreExpiration,
    clockTimestamp: nowInSeconds(),
  });
  if (typeof decoded === 'string' || !isTokenClaims(decoded)) {
    throw new InvalidTokenError('Token is missing required claims.');
  }
  return decoded;
};

/**
 * Mints a signed token for the user. Access and refresh tokens differ only in lifetime.
 * A random jti keeps two tokens minted in the same second distinct.
 */
export const issueToken = (user: Pick<User, 'id' | 'email'>, kind: TokenType): string => {
  const { jwtSecret, accessTokenTtl, refreshTokenTtl } = getConfig();
  const iat = nowInSeconds();
  const ttl = kind === 'ACCESS' ? accessTokenTtl : refreshTokenTtl;

  return jsonwebtoken.sign(
    { sub: user.id, email: user.email, type: kind, iat, exp: iat + ttl, jti: uuidv4() },
    jwtSecret,
    { algorithm: ALGORITHM }
  );
};

/**
 * Verifies signature and structure and returns the embedded identity.
 * Expiry is not checked here; use isTokenExpired for that.
 */
export const extractIdentity = (token: string): TokenIdentity => {
  try {
    const claims = verifyClaims(token, true);
    return { userId: claims.sub, email: claims.email, type: claims.type };
  } catch (error) {
    if (error instanceof InvalidTokenError) {
      throw error;
    }
    if (error instanceof jsonwebtoken.JsonWebTokenError) {
      throw new InvalidTokenError(`Invalid token: ${error.message}`);
    }
    throw error;
  }
};

// Fails closed: anything that cannot be verified counts as expired.
export const isTokenExpired = (token: string): boolean => {
  try {
    verifyClaims(token, false);
    return false;
  } catch (error) {
    if (error instanceof jsonwebtoken.TokenExpiredError) {
      return true;
    }
    if (error instanceof jsonwebtoken.JsonWebTokenError || error instanceof InvalidTokenError) {
      logger.debug(`Treating unverifiable token as expired: ${error.message}`);
      return true;
    }
    throw error;
  }
};

export const isTokenValid = (token: string, user: Pick<User, 'id'>): boolean => {
  try {
    const { userId } = extractIdentity(token);
    return userId === user.id && !isTokenExpired(token);
  } catch (error) {
    if (error instanceof InvalidTokenError) {
      return false;
    }
    throw error;
  }
};
