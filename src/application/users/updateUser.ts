import {
  normalizeEmail,
  toPublicUser,
  type PublicUser,
  type UserChanges,
} from '../../domain/auth/user.js';
import type { UserStore } from '../../domain/auth/userStore.js';
import { NotFoundError } from '../errors.js';
import { USER_NOT_FOUND_MESSAGE } from './queries.js';

export interface UpdateUserCommand {
  id: number;
  name?: string;
  email?: string;
}

export class UpdateUserUseCase {
  constructor(private userStore: UserStore) {}

  /**
   * Overwrite only the supplied fields. Empty strings count as absent.
   */
  async execute(command: UpdateUserCommand): Promise<PublicUser> {
    const changes: UserChanges = {};
    const name = command.name?.trim();
    if (name) {
      changes.name = name;
    }
    const email = command.email ? normalizeEmail(command.email) : '';
    if (email) {
      changes.email = email;
    }

    const user =
      Object.keys(changes).length === 0
        ? await this.userStore.findById(command.id)
        : await this.userStore.update(command.id, changes);

    if (!user) {
      throw new NotFoundError(USER_NOT_FOUND_MESSAGE);
    }
    return toPublicUser(user);
  }
}
