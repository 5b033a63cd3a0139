// src/models/user.types.ts
export const USER_ROLES = ['BUYER', 'SELLER', 'MANAGER', 'ADMIN'] as const;

export type Role = (typeof USER_ROLES)[number];

export const isRole = (value: unknown): value is Role =>
  USER_ROLES.some((role) => role === value);

export interface User {
  id: string;
  email: string;
  passwordHash: string;
  firstName: string;
  lastName: string;
  role: Role;
  createdAt: number;
  updatedAt: number;
}

// Denormalized view returned to clients; never carries the hash.
export type UserSummary = Pick<User, 'id' | 'firstName' | 'lastName' | 'email' | 'role'>;

export const toUserSummary = (user: User): UserSummary => ({
  id: user.id,
  firstName: user.firstName,
  lastName: user.lastName,
  email: user.email,
  role: user.role,
});
