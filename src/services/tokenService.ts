// src/services/tokenService.ts
import { db } from '../database';
import { CreateTokenInput, TokenRecord, TokenRow } from '../models/token.types';

const mapRowToToken = (row: TokenRow): TokenRecord => ({
  ...row,
  revoked: row.revoked === 1,
});

export const saveToken = (input: CreateTokenInput): TokenRecord => {
  const now = Date.now();
  const stmt = db.prepare(
    'INSERT INTO tokens (user_id, token, token_type, revoked, created_at) VALUES (?, ?, ?, 0, ?)'
  );
  const result = stmt.run(input.user_id, input.token, input.token_type, now);

  return {
    id: Number(result.lastInsertRowid),
    ...input,
    revoked: false,
    created_at: now,
  };
};

/**
 * Persists the revoked flag of every given record in one transaction.
 * MAX() keeps a revoked token revoked even if a stale record says otherwise.
 */
export const saveAllTokens = (tokens: TokenRecord[]): void => {
  const update = db.prepare('UPDATE tokens SET revoked = MAX(revoked, ?) WHERE id = ?');
  db.transaction((records: TokenRecord[]) => {
    for (const record of records) {
      update.run(record.revoked ? 1 : 0, record.id);
    }
  })(tokens);
};

export const findAllTokens = (): TokenRecord[] => {
  const rows = db.prepare<[], TokenRow>('SELECT * FROM tokens ORDER BY id ASC').all();
  return rows.map(mapRowToToken);
};

export const findTokenByValue = (token: string): TokenRecord | undefined => {
  const row = db.prepare<[string], TokenRow>('SELECT * FROM tokens WHERE token = ?').get(token);
  return row ? mapRowToToken(row) : undefined;
};

export const findTokensByUserId = (userId: string): TokenRecord[] => {
  const rows = db.prepare<[string], TokenRow>('SELECT * FROM tokens WHERE user_id = ? ORDER BY id ASC').all(userId);
  return rows.map(mapRowToToken);
};

// Access tokens of the user that have not been revoked yet.
export const findAllValidAccessTokensByUser = (userId: string): TokenRecord[] => {
  const rows = db.prepare<[string], TokenRow>(
    "SELECT * FROM tokens WHERE user_id = ? AND token_type = 'ACCESS' AND revoked = 0 ORDER BY id ASC"
  ).all(userId);
  return rows.map(mapRowToToken);
};

export const deleteToken = (token: TokenRecord): boolean => {
  const result = db.prepare('DELETE FROM tokens WHERE id = ?').run(token.id);
  return result.changes > 0;
};
