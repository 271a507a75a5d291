export const DEFAULT_ROLE = 'user';

/**
 * User record as held by the credential store.
 * `passwordHash` never leaves the application layer; responses go through
 * `toUserSummary` / `toPublicUser`.
 */
export interface User {
  readonly id: number;
  readonly email: string;
  readonly passwordHash: string;
  readonly name: string;
  readonly role: string;
  readonly active: boolean;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface NewUser {
  email: string;
  passwordHash: string;
  name: string;
  role: string;
  active: boolean;
}

export interface UserChanges {
  email?: string;
  name?: string;
}

export interface UserSummary {
  id: number;
  email: string;
  name: string;
  role: string;
}

export interface PublicUser extends UserSummary {
  active: boolean;
  createdAt: Date;
  updatedAt: Date;
}

/** Emails are compared and stored case-insensitively. */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function toUserSummary(user: User): UserSummary {
  return {
    id: user.id,
    email: user.email,
    name: user.name,
    role: user.role,
  };
}

export function toPublicUser(user: User): PublicUser {
  return {
    ...toUserSummary(user),
    active: user.active,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
}
