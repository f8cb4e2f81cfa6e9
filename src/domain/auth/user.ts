/**
 * User record as held by the store.
 */
export interface User {
  readonly email: string;
  readonly passwordHash: string;
  readonly handle: string;
  readonly publicKey: string;
  readonly bio: string | null;
  readonly createdAt: Date;
}

/**
 * What the service exposes about a user: everything but the password hash.
 */
export type UserProfile = Omit<User, 'passwordHash' | 'createdAt'>;

export function toProfile(user: User): UserProfile {
  return {
    email: user.email,
    handle: user.handle,
    publicKey: user.publicKey,
    bio: user.bio,
  };
}
