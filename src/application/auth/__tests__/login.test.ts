import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { Password } from '../../../domain/auth/password.js';
import { InMemoryUserStore } from '../../../infra/db/__tests__/inMemoryUserStore.js';
import { UnauthorizedError } from '../../errors.js';
import { LoginUseCase, INVALID_CREDENTIALS_MESSAGE } from '../login.js';
import { RegisterUseCase } from '../register.js';
import { JwtTokenService } from '../tokens.js';

describe('RegisterUseCase and LoginUseCase', () => {
  let store: InMemoryUserStore;
  let tokens: JwtTokenService;
  let register: RegisterUseCase;
  let login: LoginUseCase;

  beforeEach(() => {
    store = new InMemoryUserStore();
    tokens = new JwtTokenService({ secret: 'test-secret', ttlSeconds: 600 });
    register = new RegisterUseCase(store);
    login = new LoginUseCase(store, tokens);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should register with role "user" and an active account', async () => {
    const summary = await register.execute({ email: 'a@b.com', password: 'secret1', name: ' A ' });

    expect(summary).toEqual({ id: 1, email: 'a@b.com', name: 'A', role: 'user' });
    const stored = await store.findById(1);
    expect(stored?.active).toBe(true);
    expect(stored?.passwordHash).not.toBe('secret1');
  });

  it('should assign strictly increasing ids', async () => {
    const first = await register.execute({ email: 'a@b.com', password: 'secret1', name: 'A' });
    const second = await register.execute({ email: 'c@d.com', password: 'secret1', name: 'C' });

    expect(second.id).toBeGreaterThan(first.id);
  });

  it('should log in right after registering', async () => {
    await register.execute({ email: 'a@b.com', password: 'secret1', name: 'A' });

    const result = await login.execute({ email: 'a@b.com', password: 'secret1' });

    expect(result.tokenType).toBe('Bearer');
    expect(result.expiresIn).toBe(600);
    expect(result.user).toEqual({ id: 1, email: 'a@b.com', name: 'A', role: 'user' });
    expect(tokens.verify(`Bearer ${result.token}`)).toEqual({
      ok: true,
      identity: { userId: 1, email: 'a@b.com' },
    });
  });

  it('should reject a wrong password with the generic message', async () => {
    await register.execute({ email: 'a@b.com', password: 'secret1', name: 'A' });

    await expect(login.execute({ email: 'a@b.com', password: 'secret2' })).rejects.toThrow(
      new UnauthorizedError(INVALID_CREDENTIALS_MESSAGE)
    );
  });

  it('should reject an unknown email with the generic message', async () => {
    await expect(login.execute({ email: 'nobody@b.com', password: 'secret1' })).rejects.toThrow(
      new UnauthorizedError(INVALID_CREDENTIALS_MESSAGE)
    );
  });

  it('should still run a password verification for an unknown email', async () => {
    const verify = vi.spyOn(Password, 'verify');

    await expect(login.execute({ email: 'nobody@b.com', password: 'secret1' })).rejects.toThrow(
      INVALID_CREDENTIALS_MESSAGE
    );

    expect(verify).toHaveBeenCalledTimes(1);
    expect(verify.mock.calls[0][0]).toBe('secret1');
    expect(verify.mock.calls[0][1]).toMatch(/^\$argon2id\$/);
  });

  it('should reject a deactivated account with the generic message', async () => {
    const now = new Date();
    store.seed({
      id: 5,
      email: 'off@b.com',
      passwordHash: await Password.hash('secret1'),
      name: 'Off',
      role: 'user',
      active: false,
      createdAt: now,
      updatedAt: now,
    });

    await expect(login.execute({ email: 'off@b.com', password: 'secret1' })).rejects.toThrow(
      INVALID_CREDENTIALS_MESSAGE
    );
  });
});
