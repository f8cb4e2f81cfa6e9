import { User } from '../../domain/auth/user.js';

export interface NewUser {
  email: string;
  passwordHash: string;
  handle: string;
  publicKey: string;
  bio?: string | null;
}

/** Fields an update may replace; absent keys are left alone. */
export interface UserChanges {
  passwordHash?: string;
  handle?: string;
  publicKey?: string;
  bio?: string | null;
}

/**
 * Persistence port for user records. Each call is its own unit of work.
 */
export interface UserStore {
  findByEmail(email: string): Promise<User | null>;
  /** Rejects with DuplicateEmailError when the email is taken. */
  insert(user: NewUser): Promise<User>;
  /** Resolves null when no user has this email. */
  update(email: string, changes: UserChanges): Promise<User | null>;
  /** Resolves false when there was nothing to delete. */
  delete(email: string): Promise<boolean>;
  listEmails(): Promise<string[]>;
}

export class DuplicateEmailError extends Error {
  constructor(readonly email: string) {
    super(`Email already registered: ${email}`);
    this.name = 'DuplicateEmailError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
