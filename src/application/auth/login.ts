import { Password } from '../../domain/auth/password.js';
import { normalizeEmail, toUserSummary, type UserSummary } from '../../domain/auth/user.js';
import type { UserStore } from '../../domain/auth/userStore.js';
import { UnauthorizedError } from '../errors.js';
import type { TokenIssuer } from './tokens.js';

/** Same text for unknown email, wrong password and inactive account. */
export const INVALID_CREDENTIALS_MESSAGE = 'Invalid email or password';

let dummyHash: Promise<string> | undefined;

/**
 * Hash checked when the email is unknown, so a miss costs one Argon2
 * verification like a hit does.
 */
function getDummyHash(): Promise<string> {
  dummyHash ??= Password.hash('dummy-password-for-unknown-accounts');
  return dummyHash;
}

export interface LoginCommand {
  email: string;
  password: string;
}

export interface LoginResult {
  token: string;
  tokenType: 'Bearer';
  expiresIn: number;
  user: UserSummary;
}

export class LoginUseCase {
  constructor(
    private userStore: UserStore,
    private tokenIssuer: TokenIssuer
  ) {}

  async execute(command: LoginCommand): Promise<LoginResult> {
    const user = await this.userStore.findByEmail(normalizeEmail(command.email));
    if (!user) {
      await Password.verify(command.password, await getDummyHash());
      throw new UnauthorizedError(INVALID_CREDENTIALS_MESSAGE);
    }

    const isValid = await Password.verify(command.password, user.passwordHash);
    if (!isValid || !user.active) {
      throw new UnauthorizedError(INVALID_CREDENTIALS_MESSAGE);
    }

    const { token, expiresIn } = this.tokenIssuer.issue({
      userId: user.id,
      email: user.email,
    });

    return {
      token,
      tokenType: 'Bearer',
      expiresIn,
      user: toUserSummary(user),
    };
  }
}
