import { toProfile, UserProfile } from '../../domain/auth/user.js';
import { NotFoundError } from '../errors.js';
import { UserStore } from './userStore.js';

/**
 * Public directory reads. No token required.
 */
export class UserQueries {
  constructor(private userStore: UserStore) {}

  async getUser(email: string): Promise<UserProfile> {
    const user = await this.userStore.findByEmail(email);
    if (!user) {
      throw new NotFoundError(`No Users with email: ${email}`);
    }
    return toProfile(user);
  }

  async listEmails(): Promise<string[]> {
    return this.userStore.listEmails();
  }
}
