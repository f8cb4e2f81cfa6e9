import { AuthGate } from '../../domain/auth/authGate.js';
import { NotFoundError, UnauthorizedError } from '../errors.js';
import { UserStore } from './userStore.js';

export interface DeleteUserCommand {
  email: string;
  token: string;
}

export class DeleteUserUseCase {
  constructor(
    private userStore: UserStore,
    private authGate: AuthGate
  ) {}

  async execute(command: DeleteUserCommand): Promise<void> {
    const user = await this.userStore.findByEmail(command.email);
    if (!user) {
      throw new NotFoundError(`No User with email: ${command.email}`);
    }

    const decision = this.authGate.authorize(command.email, command.token, user.passwordHash);
    if (!decision.authorized) {
      throw new UnauthorizedError(decision.reason);
    }

    const deleted = await this.userStore.delete(command.email);
    if (!deleted) {
      throw new NotFoundError(`No User with email: ${command.email}`);
    }
  }
}
