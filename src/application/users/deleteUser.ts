import type { UserStore } from '../../domain/auth/userStore.js';
import { NotFoundError } from '../errors.js';
import { USER_NOT_FOUND_MESSAGE } from './queries.js';

export class DeleteUserUseCase {
  constructor(private userStore: UserStore) {}

  async execute(id: number): Promise<void> {
    const deleted = await this.userStore.delete(id);
    if (!deleted) {
      throw new NotFoundError(USER_NOT_FOUND_MESSAGE);
    }
  }
}
