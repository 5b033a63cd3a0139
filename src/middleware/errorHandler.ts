// src/middleware/errorHandler.ts
import { Request, Response, NextFunction } from 'express';
import {
  AuthError,
  InvalidCredentialsError,
  RefreshDeniedError,
  UnknownIdentityError,
} from '../errors/authErrors';
import logger from '../utils/logger';
import { logSafeError } from '../utils/safeLogger';

export const GENERIC_CREDENTIALS_MESSAGE = 'Invalid email or password.';

// Errors raised by express.json() (body-parser) carry a `type` tag and the HTTP status to answer with.
interface BodyParserError extends Error {
  type: string;
  status: number;
}

const isBodyParserError = (error: unknown): error is BodyParserError =>
  error instanceof Error &&
  'type' in error &&
  typeof error.type === 'string' &&
  'status' in error &&
  typeof error.status === 'number';

/**
 * Final Express error handler.
 * Unknown-email and wrong-password failures share one public response; the distinction is only logged.
 */
export const errorHandler = (error: unknown, req: Request, res: Response, next: NextFunction): void => {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (error instanceof RefreshDeniedError) {
    res.status(error.status).end();
    return;
  }

  if (error instanceof UnknownIdentityError || error instanceof InvalidCredentialsError) {
    logger.warn(`${req.method} ${req.originalUrl} - ${error.name}: ${error.message}`);
    res.status(401).json({ error: 'INVALID_CREDENTIALS', message: GENERIC_CREDENTIALS_MESSAGE });
    return;
  }

  if (error instanceof AuthError) {
    logger.warn(`${req.method} ${req.originalUrl} - ${error.name}: ${error.message}`);
    res.status(error.status).json(error.toJSON());
    return;
  }

  if (isBodyParserError(error) && error.status >= 400 && error.status < 500) {
    if (error.type === 'entity.parse.failed') {
      res.status(400).json({ error: 'INVALID_INPUT', message: 'Request body is not valid JSON.' });
      return;
    }
    logger.warn(`${req.method} ${req.originalUrl} - rejected request body (${error.type}): ${error.message}`);
    res.status(error.status).json({ error: 'INVALID_INPUT', message: error.message });
    return;
  }

  logSafeError(logger, 'Unhandled error while processing request', error, {
    method: req.method,
    path: req.originalUrl,
  });
  res.status(500).json({ error: 'INTERNAL_ERROR', message: 'An unexpected error occurred.' });
};
