import { DuplicateEmailError } from '../../domain/auth/errors.js';
import type { NewUser, User, UserChanges } from '../../domain/auth/user.js';
import type { UserStore } from '../../domain/auth/userStore.js';
import { isUniqueViolation, type Queryable } from './pool.js';

interface UserRow {
  id: number;
  email: string;
  password_hash: string;
  name: string;
  role: string;
  active: boolean;
  created_at: Date;
  updated_at: Date;
}

const COLUMNS = 'id, email, password_hash, name, role, active, created_at, updated_at';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    name: row.name,
    role: row.role,
    active: row.active,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * PostgreSQL-backed credential store. Soft-deleted rows (`deleted_at` set)
 * are invisible to every read and write.
 */
export class PgUserRepo implements UserStore {
  constructor(private db: Queryable) {}

  async create(user: NewUser): Promise<User> {
    try {
      const result = await this.db.query<UserRow>(
        `INSERT INTO users (email, password_hash, name, role, active)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${COLUMNS}`,
        [user.email, user.passwordHash, user.name, user.role, user.active]
      );
      return toUser(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateEmailError();
      }
      throw error;
    }
  }

  async findByEmail(email: string): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${COLUMNS} FROM users WHERE email = $1 AND deleted_at IS NULL`,
      [email]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async findById(id: number): Promise<User | null> {
    const result = await this.db.query<UserRow>(
      `SELECT ${COLUMNS} FROM users WHERE id = $1 AND deleted_at IS NULL`,
      [id]
    );
    return result.rows.length === 0 ? null : toUser(result.rows[0]);
  }

  async list(): Promise<User[]> {
    const result = await this.db.query<UserRow>(
      `SELECT ${COLUMNS} FROM users WHERE deleted_at IS NULL ORDER BY id`
    );
    return result.rows.map(toUser);
  }

  async update(id: number, changes: UserChanges): Promise<User | null> {
    try {
      const result = await this.db.query<UserRow>(
        `UPDATE users
         SET name = COALESCE($2, name),
             email = COALESCE($3, email),
             updated_at = NOW()
         WHERE id = $1 AND deleted_at IS NULL
         RETURNING ${COLUMNS}`,
        [id, changes.name ?? null, changes.email ?? null]
      );
      return result.rows.length === 0 ? null : toUser(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateEmailError();
      }
      throw error;
    }
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.db.query(
      'DELETE FROM users WHERE id = $1 AND deleted_at IS NULL',
      [id]
    );
    return (result.rowCount ?? 0) > 0;
  }
}
