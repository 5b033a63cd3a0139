import winston from 'winston';

// Context keys whose values must never reach the log output.
const SENSITIVE_KEYS = new Set(['password', 'passwordhash', 'token', 'accesstoken', 'refreshtoken', 'refresh_token']);
const REDACTED = '[REDACTED]';

const isSensitiveKey = (key: string): boolean => SENSITIVE_KEYS.has(key.toLowerCase());

// Copies plain objects and arrays with sensitive values masked. Errors and primitives pass through.
const redactValue = (value: unknown, seen: WeakSet<object>): unknown => {
  if (value === null || typeof value !== 'object' || value instanceof Error) {
    return value;
  }
  if (seen.has(value)) {
    return '[Circular]';
  }
  seen.add(value);
  const copy = Array.isArray(value)
    ? value.map((entry: unknown) => redactValue(entry, seen))
    : Object.fromEntries(
        Object.entries(value).map(([key, entry]) => [key, isSensitiveKey(key) ? REDACTED : redactValue(entry, seen)])
      );
  // Only ancestors count as cycles; a shared sibling reference is copied again.
  seen.delete(value);
  return copy;
};

/**
 * winston format masking password and token fields in an entry's metadata, at any depth.
 * Applied by the application logger to every entry.
 */
export const redactSensitive = winston.format((info) => {
  const seen = new WeakSet<object>();
  for (const key of Object.keys(info)) {
    const value = info[key];
    if (isSensitiveKey(key)) {
      info[key] = REDACTED;
    } else if (typeof value === 'object' && value !== null) {
      info[key] = redactValue(value, seen);
    }
  }
  return info;
});

// Replaces sensitive values and BigInts so the context can be serialized as JSON.
export function redactContext(context: Record<string, unknown>): string {
  try {
    return JSON.stringify(context, (key, value: unknown) => {
      if (isSensitiveKey(key)) {
        return REDACTED;
      }
      if (typeof value === 'bigint') {
        return value.toString() + 'n';
      }
      return value;
    });
  } catch (e) {
    if (e instanceof Error) {
      return `[Unserializable Object: ${e.message}]`;
    }
    return '[Unserializable Object]';
  }
}

export function logSafeError(
  loggerInstance: winston.Logger,
  message: string,
  error: unknown,
  additionalContext?: Record<string, unknown>
): void {
  const logDetails: Record<string, unknown> = {
    messagePrimary: message, // winston reserves 'message'
  };

  if (error instanceof Error) {
    logDetails.errorName = error.name;
    logDetails.errorMessage = error.message;
    logDetails.errorStack = error.stack;
  } else if (typeof error === 'object' && error !== null) {
    logDetails.errorObject = redactContext({ error });
  } else {
    logDetails.errorValue = String(error);
  }

  if (additionalContext) {
    logDetails.context = redactContext(additionalContext);
  }

  loggerInstance.error(message, logDetails);
}
