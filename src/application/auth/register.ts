import { Password } from '../../domain/auth/password.js';
import {
  DEFAULT_ROLE,
  normalizeEmail,
  toUserSummary,
  type UserSummary,
} from '../../domain/auth/user.js';
import type { UserStore } from '../../domain/auth/userStore.js';

export interface RegisterCommand {
  email: string;
  password: string;
  name: string;
}

export class RegisterUseCase {
  constructor(private userStore: UserStore) {}

  /**
   * Create a user with the default role.
   * Duplicate emails surface as `DuplicateEmailError` from the store's unique
   * index; there is no prior lookup to race against.
   */
  async execute(command: RegisterCommand): Promise<UserSummary> {
    const passwordHash = await Password.hash(command.password);

    const user = await this.userStore.create({
      email: normalizeEmail(command.email),
      passwordHash,
      name: command.name.trim(),
      role: DEFAULT_ROLE,
      active: true,
    });

    return toUserSummary(user);
  }
}
