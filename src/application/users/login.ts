import { PasswordVault } from '../../domain/auth/password.js';
import { TokenService } from '../../domain/auth/token.js';
import { IncorrectPasswordError, NotFoundError } from '../errors.js';
import { UserStore } from './userStore.js';

export interface LoginCommand {
  email: string;
  password: string;
}

export class LoginUseCase {
  constructor(
    private userStore: UserStore,
    private tokenService: TokenService
  ) {}

  /**
   * Check the password and hand out a session token bound to the
   * user's current password hash.
   */
  async execute(command: LoginCommand): Promise<string> {
    const user = await this.userStore.findByEmail(command.email);
    if (!user) {
      throw new NotFoundError(`No user with email: ${command.email}`);
    }

    const isValid = await PasswordVault.verify(command.password, user.passwordHash);
    if (!isValid) {
      throw new IncorrectPasswordError();
    }

    return this.tokenService.issue(user.email, user.passwordHash);
  }
}
