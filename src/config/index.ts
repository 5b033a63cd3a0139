// src/config/index.ts
import { ConfigurationError } from '../errors/authErrors';

export interface AppConfig {
  nodeEnv: string;
  port: number;
  jwtSecret: string;
  accessTokenTtl: number; // seconds
  refreshTokenTtl: number; // seconds
  bcryptSaltRounds: number;
  dbPath: string;
}

const DEFAULT_ACCESS_TOKEN_TTL = 60 * 60; // 1 hour
const DEFAULT_REFRESH_TOKEN_TTL = 7 * 24 * 60 * 60; // 7 days
const DEFAULT_SALT_ROUNDS = 10;
const DEFAULT_PORT = 3000;

const readPositiveInt = (env: NodeJS.ProcessEnv, name: string, fallback: number): number => {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}".`);
  }
  return value;
};

/**
 * Builds the application configuration from environment variables.
 * Throws a ConfigurationError when JWT_SECRET is missing or a numeric setting is malformed.
 */
export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const jwtSecret = env.JWT_SECRET;
  if (!jwtSecret) {
    throw new ConfigurationError('JWT_SECRET is not defined in environment variables.');
  }

  const nodeEnv = env.NODE_ENV || 'development';

  return {
    nodeEnv,
    port: readPositiveInt(env, 'PORT', DEFAULT_PORT),
    jwtSecret,
    accessTokenTtl: readPositiveInt(env, 'ACCESS_TOKEN_TTL', DEFAULT_ACCESS_TOKEN_TTL),
    refreshTokenTtl: readPositiveInt(env, 'REFRESH_TOKEN_TTL', DEFAULT_REFRESH_TOKEN_TTL),
    bcryptSaltRounds: readPositiveInt(env, 'BCRYPT_SALT_ROUNDS', DEFAULT_SALT_ROUNDS),
    dbPath: env.DB_PATH || (nodeEnv === 'test' ? ':memory:' : 'gigboard.db'),
  };
};

let cachedConfig: AppConfig | undefined;

export const getConfig = (): AppConfig => {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
};

// Tests that change process.env call this so the next getConfig() re-reads it.
export const resetConfig = (): void => {
  cachedConfig = undefined;
};
