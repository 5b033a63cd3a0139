// src/services/userService.ts
import { User } from '../models/user.types';
import { v4 as uuidv4 } from 'uuid';
import { db, isUniqueViolation } from '../database';
import { DuplicateIdentityError } from '../errors/authErrors';
import logger from '../utils/logger';

// Type for user data passed to createUser, excluding generated fields
export type CreateUserInput = Omit<User, 'id' | 'createdAt' | 'updatedAt'>;

/**
 * Inserts a new credential record.
 * A UNIQUE violation on email (including one lost to a concurrent registration)
 * surfaces as DuplicateIdentityError.
 */
export const createUser = (userData: CreateUserInput): User => {
  const now = Date.now();
  const newUser: User = {
    id: uuidv4(),
    ...userData,
    createdAt: now,
    updatedAt: now,
  };

  const stmt = db.prepare(
    `INSERT INTO users (id, email, passwordHash, firstName, lastName, role, createdAt, updatedAt)
     VALUES (@id, @email, @passwordHash, @firstName, @lastName, @role, @createdAt, @updatedAt)`
  );
  try {
    stmt.run(newUser);
  } catch (error) {
    if (isUniqueViolation(error)) {
      logger.warn(`Registration rejected by unique constraint for ${userData.email}`);
      throw new DuplicateIdentityError();
    }
    throw error;
  }

  return newUser;
};

export const findUserByEmail = (email: string): User | undefined => {
  const stmt = db.prepare<[string], User>('SELECT * FROM users WHERE email = ?');
  return stmt.get(email);
};

export const findUserById = (id: string): User | undefined => {
  const stmt = db.prepare<[string], User>('SELECT * FROM users WHERE id = ?');
  return stmt.get(id);
};

export const getAllUsers = (): User[] => {
  const stmt = db.prepare<[], User>('SELECT * FROM users');
  return stmt.all();
};

// Removes the user; their tokens go with them through ON DELETE CASCADE.
export const deleteUser = (id: string): boolean => {
  const result = db.prepare('DELETE FROM users WHERE id = ?').run(id);
  return result.changes > 0;
};
