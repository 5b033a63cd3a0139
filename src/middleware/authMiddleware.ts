// src/middleware/authMiddleware.ts
import { Request, Response, NextFunction } from 'express';
import { InvalidTokenError } from '../errors/authErrors';
import { extractIdentity, isTokenExpired } from '../services/jwtService';
import { findTokenByValue } from '../services/tokenService';
import logger from '../utils/logger';

export interface AuthIdentity {
  userId: string;
  email: string;
}

// Define an interface for requests that have been authenticated
export interface AuthenticatedRequest extends Request {
  auth?: AuthIdentity;
}

/**
 * Accepts only unexpired ACCESS tokens whose stored record, when there is one, is not revoked.
 * A token without a record (its insert failed at issuance) is still honoured.
 */
export const authenticateJWT = (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
  const authHeader = req.headers.authorization;

  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    res.status(401).json({ error: 'Access denied, no token provided or invalid format.' });
    return;
  }

  const token = authHeader.substring(7); // Remove "Bearer " prefix
  if (!token) {
    res.status(401).json({ error: 'Access denied, token missing.' });
    return;
  }

  try {
    const identity = extractIdentity(token);
    if (identity.type !== 'ACCESS') {
      logger.warn(`Access denied: ${identity.type} token presented as bearer token for user ${identity.userId}`);
      res.status(403).json({ error: 'Invalid token.' });
      return;
    }
    if (isTokenExpired(token)) {
      logger.warn(`Access denied due to expired token for user ${identity.userId}`);
      res.status(403).json({ error: 'Access denied, token expired.' });
      return;
    }
    if (findTokenByValue(token)?.revoked) {
      logger.warn(`Access denied due to revoked token for user ${identity.userId}`);
      res.status(403).json({ error: 'Access denied, token revoked.' });
      return;
    }

    req.auth = { userId: identity.userId, email: identity.email };
    next();
  } catch (error) {
    if (error instanceof InvalidTokenError) {
      logger.warn(`Access denied due to invalid token: ${error.message}`);
      res.status(403).json({ error: 'Invalid token.' });
      return;
    }
    next(error);
  }
};
