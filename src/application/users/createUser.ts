import { PasswordVault } from '../../domain/auth/password.js';
import { toProfile, UserProfile } from '../../domain/auth/user.js';
import { ConflictError } from '../errors.js';
import { DuplicateEmailError, UserStore } from './userStore.js';

export interface CreateUserCommand {
  email: string;
  password: string;
  handle: string;
  publicKey: string;
}

export class CreateUserUseCase {
  constructor(private userStore: UserStore) {}

  async execute(command: CreateUserCommand): Promise<UserProfile> {
    const existing = await this.userStore.findByEmail(command.email);
    if (existing) {
      throw new ConflictError(`User with email already exists: ${command.email}`);
    }

    const passwordHash = await PasswordVault.hash(command.password);

    try {
      const user = await this.userStore.insert({
        email: command.email,
        passwordHash,
        handle: command.handle,
        publicKey: command.publicKey,
      });
      return toProfile(user);
    } catch (error) {
      // Lost a race with a concurrent registration
      if (error instanceof DuplicateEmailError) {
        throw new ConflictError(`User with email already exists: ${error.email}`);
      }
      throw error;
    }
  }
}
