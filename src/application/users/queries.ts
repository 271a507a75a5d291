import { toPublicUser, type PublicUser } from '../../domain/auth/user.js';
import type { UserStore } from '../../domain/auth/userStore.js';
import type { Identity } from '../auth/tokens.js';
import { NotFoundError } from '../errors.js';

export const USER_NOT_FOUND_MESSAGE = 'User not found';

export class UserQueries {
  constructor(private userStore: UserStore) {}

  async listUsers(): Promise<PublicUser[]> {
    const users = await this.userStore.list();
    return users.map(toPublicUser);
  }

  async getUser(id: number): Promise<PublicUser> {
    const user = await this.userStore.findById(id);
    if (!user) {
      throw new NotFoundError(USER_NOT_FOUND_MESSAGE);
    }
    return toPublicUser(user);
  }

  /** The caller's own record; 404 once it has been deleted. */
  async getProfile(identity: Identity): Promise<PublicUser> {
    return this.getUser(identity.userId);
  }
}
