import type { NewUser, User, UserChanges } from './user.js';

/**
 * Persistence contract for user records. Every method touches at most one
 * row, except `list`.
 *
 * `create` and `update` throw `DuplicateEmailError` when the email is already
 * taken by another live record.
 */
export interface UserStore {
  create(user: NewUser): Promise<User>;
  findByEmail(email: string): Promise<User | null>;
  findById(id: number): Promise<User | null>;
  list(): Promise<User[]>;
  /** Returns null when no live record has this id. */
  update(id: number, changes: UserChanges): Promise<User | null>;
  /** Returns false when no live record has this id. */
  delete(id: number): Promise<boolean>;
}
