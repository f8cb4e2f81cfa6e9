import { AuthGate } from '../../domain/auth/authGate.js';
import { PasswordVault } from '../../domain/auth/password.js';
import { toProfile, UserProfile } from '../../domain/auth/user.js';
import { NotFoundError, UnauthorizedError } from '../errors.js';
import { UserChanges, UserStore } from './userStore.js';

export interface UpdateUserCommand {
  email: string;
  token: string;
  changes: {
    password?: string;
    handle?: string;
    publicKey?: string;
    bio?: string | null;
  };
}

export class UpdateUserUseCase {
  constructor(
    private userStore: UserStore,
    private authGate: AuthGate
  ) {}

  /**
   * Merge the given fields into the user's record. A new password is hashed
   * here, which leaves every token issued against the old one stale.
   */
  async execute(command: UpdateUserCommand): Promise<UserProfile> {
    const user = await this.userStore.findByEmail(command.email);
    if (!user) {
      throw new NotFoundError(`No User with email: ${command.email}`);
    }

    const decision = this.authGate.authorize(command.email, command.token, user.passwordHash);
    if (!decision.authorized) {
      throw new UnauthorizedError(decision.reason);
    }

    const { password, handle, publicKey, bio } = command.changes;
    const changes: UserChanges = {};
    if (password !== undefined) {
      changes.passwordHash = await PasswordVault.hash(password);
    }
    if (handle !== undefined) {
      changes.handle = handle;
    }
    if (publicKey !== undefined) {
      changes.publicKey = publicKey;
    }
    if (bio !== undefined) {
      changes.bio = bio;
    }

    const updated = await this.userStore.update(command.email, changes);
    if (!updated) {
      throw new NotFoundError(`No User with email: ${command.email}`);
    }

    return toProfile(updated);
  }
}
