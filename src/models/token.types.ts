// src/models/token.types.ts
export type TokenType = 'ACCESS' | 'REFRESH';

export const isTokenType = (value: unknown): value is TokenType =>
  value === 'ACCESS' || value === 'REFRESH';

export interface TokenRecord {
  id: number;
  user_id: string;
  token: string; // the signed JWT
  token_type: TokenType;
  revoked: boolean;
  created_at: number; // Timestamp
}

// Shape of a row in the tokens table; SQLite stores booleans as 0/1.
export interface TokenRow extends Omit<TokenRecord, 'revoked'> {
  revoked: number;
}

export type CreateTokenInput = Pick<TokenRecord, 'user_id' | 'token' | 'token_type'>;
