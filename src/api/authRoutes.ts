// src/api/authRoutes.ts
import { Router, Request, Response, NextFunction } from 'express';
import { getConfig } from '../config';
import { authenticateJWT, AuthenticatedRequest } from '../middleware/authMiddleware';
import { authenticate, getUserSummary, refresh, register } from '../services/authService';

export const REFRESH_TOKEN_COOKIE = 'refresh_token';

// Bodies come straight from JSON; nothing is trusted to be a string.
interface RegisterRequestBody {
  email?: unknown;
  password?: unknown;
  firstName?: unknown;
  lastName?: unknown;
  role?: unknown;
}

interface LoginRequestBody {
  email?: unknown;
  password?: unknown;
}

const readString = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);

const setRefreshCookie = (res: Response, refreshToken: string): void => {
  const { refreshTokenTtl, nodeEnv } = getConfig();
  res.cookie(REFRESH_TOKEN_COOKIE, refreshToken, {
    httpOnly: true,
    sameSite: 'strict',
    secure: nodeEnv === 'production',
    path: '/api/auth',
    maxAge: refreshTokenTtl * 1000,
  });
};

const router = Router();

// POST /register
router.post('/register', async (req: Request<{}, {}, RegisterRequestBody>, res: Response, next: NextFunction): Promise<void> => {
  try {
    const body: RegisterRequestBody = req.body ?? {};
    const result = await register({
      email: readString(body.email),
      password: readString(body.password),
      firstName: readString(body.firstName),
      lastName: readString(body.lastName),
      role: readString(body.role),
    });
    setRefreshCookie(res, result.refreshToken);
    res.status(201).json(result);
  } catch (error) {
    next(error);
  }
});

// POST /login
router.post('/login', async (req: Request<{}, {}, LoginRequestBody>, res: Response, next: NextFunction): Promise<void> => {
  try {
    const body: LoginRequestBody = req.body ?? {};
    const result = await authenticate(readString(body.email), readString(body.password));
    setRefreshCookie(res, result.refreshToken);
    res.status(200).json(result);
  } catch (error) {
    next(error);
  }
});

// POST /refresh - the refresh token is read from the cookie only
router.post('/refresh', (req: Request, res: Response, next: NextFunction): void => {
  try {
    const cookies: Record<string, unknown> = req.cookies ?? {};
    const result = refresh(readString(cookies[REFRESH_TOKEN_COOKIE]));
    res.status(200).json(result);
  } catch (error) {
    next(error);
  }
});

// GET /me
router.get('/me', authenticateJWT, (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
  try {
    if (!req.auth) {
      res.status(401).json({ error: 'Unauthorized: identity missing.' });
      return;
    }
    res.status(200).json(getUserSummary(req.auth.userId));
  } catch (error) {
    next(error);
  }
});

export default router;
