import pg from 'pg';
import { User } from '../../domain/auth/user.js';
import {
  DuplicateEmailError,
  NewUser,
  UserChanges,
  UserStore,
} from '../../application/users/userStore.js';

const UNIQUE_VIOLATION = '23505';

interface UserRow {
  email: string;
  password_hash: string;
  handle: string;
  public_key: string;
  bio: string | null;
  created_at: Date;
}

const USER_COLUMNS = 'email, password_hash, handle, public_key, bio, created_at';

function toUser(row: UserRow): User {
  return {
    email: row.email,
    passwordHash: row.password_hash,
    handle: row.handle,
    publicKey: row.public_key,
    bio: row.bio,
    createdAt: row.created_at,
  };
}

export class PgUserRepo implements UserStore {
  constructor(private pool: pg.Pool) {}

  async findByEmail(email: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
      [email]
    );

    if (result.rows.length === 0) {
      return null;
    }

    return toUser(result.rows[0]);
  }

  async insert(user: NewUser): Promise<User> {
    try {
      const result = await this.pool.query<UserRow>(
        `INSERT INTO users (email, password_hash, handle, public_key, bio)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING ${USER_COLUMNS}`,
        [user.email, user.passwordHash, user.handle, user.publicKey, user.bio ?? null]
      );
      return toUser(result.rows[0]);
    } catch (error) {
      if (error instanceof pg.DatabaseError && error.code === UNIQUE_VIOLATION) {
        throw new DuplicateEmailError(user.email);
      }
      throw error;
    }
  }

  async update(email: string, changes: UserChanges): Promise<User | null> {
    // bio is the only nullable column, so it needs an explicit "was set" flag
    const result = await this.pool.query<UserRow>(
      `UPDATE users SET
         password_hash = COALESCE($2, password_hash),
         handle = COALESCE($3, handle),
         public_key = COALESCE($4, public_key),
         bio = CASE WHEN $5::boolean THEN $6::text ELSE bio END
       WHERE email = $1
       RETURNING ${USER_COLUMNS}`,
      [
        email,
        changes.passwordHash ?? null,
        changes.handle ?? null,
        changes.publicKey ?? null,
        changes.bio !== undefined,
        changes.bio ?? null,
      ]
    );

    if (result.rows.length === 0) {
      return null;
    }

    return toUser(result.rows[0]);
  }

  async delete(email: string): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM users WHERE email = $1', [email]);
    return (result.rowCount ?? 0) > 0;
  }

  async listEmails(): Promise<string[]> {
    const result = await this.pool.query<{ email: string }>(
      'SELECT email FROM users ORDER BY created_at, email'
    );
    return result.rows.map((row) => row.email);
  }
}
