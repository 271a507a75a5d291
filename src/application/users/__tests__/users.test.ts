import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryUserStore } from '../../../infra/db/__tests__/inMemoryUserStore.js';
import { DuplicateEmailError } from '../../../domain/auth/errors.js';
import { NotFoundError } from '../../errors.js';
import { UserQueries } from '../queries.js';
import { UpdateUserUseCase } from '../updateUser.js';
import { DeleteUserUseCase } from '../deleteUser.js';

describe('user management use cases', () => {
  const created = new Date('2024-01-01T00:00:00Z');
  const later = new Date('2024-02-01T00:00:00Z');
  let now: Date;
  let store: InMemoryUserStore;

  beforeEach(async () => {
    now = created;
    store = new InMemoryUserStore(() => now);
    await store.create({ email: 'a@b.com', passwordHash: 'hash-a', name: 'A', role: 'user', active: true });
    await store.create({ email: 'c@d.com', passwordHash: 'hash-c', name: 'C', role: 'admin', active: true });
  });

  describe('UserQueries', () => {
    it('should list users in id order without password hashes', async () => {
      const users = await new UserQueries(store).listUsers();

      expect(users).toEqual([
        { id: 1, email: 'a@b.com', name: 'A', role: 'user', active: true, createdAt: created, updatedAt: created },
        { id: 2, email: 'c@d.com', name: 'C', role: 'admin', active: true, createdAt: created, updatedAt: created },
      ]);
    });

    it('should return an empty list for an empty store', async () => {
      expect(await new UserQueries(new InMemoryUserStore()).listUsers()).toEqual([]);
    });

    it('should throw NotFoundError for an unknown id', async () => {
      await expect(new UserQueries(store).getUser(99)).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should resolve the profile from the identity', async () => {
      const profile = await new UserQueries(store).getProfile({ userId: 2, email: 'c@d.com' });

      expect(profile.name).toBe('C');
    });
  });

  describe('UpdateUserUseCase', () => {
    it('should change only the name and bump updatedAt', async () => {
      now = later;
      const user = await new UpdateUserUseCase(store).execute({ id: 1, name: '  Alice  ' });

      expect(user).toMatchObject({ id: 1, name: 'Alice', email: 'a@b.com', updatedAt: later });
    });

    it('should leave the record untouched when nothing is supplied', async () => {
      now = later;
      const user = await new UpdateUserUseCase(store).execute({ id: 1, name: '', email: '' });

      expect(user.updatedAt).toEqual(created);
    });

    it('should surface a duplicate email from the store', async () => {
      await expect(
        new UpdateUserUseCase(store).execute({ id: 1, email: 'C@D.com' })
      ).rejects.toBeInstanceOf(DuplicateEmailError);
    });

    it('should allow re-saving the user\'s own email', async () => {
      const user = await new UpdateUserUseCase(store).execute({ id: 1, email: 'a@b.com' });

      expect(user.email).toBe('a@b.com');
    });

    it('should throw NotFoundError for an unknown id, with or without changes', async () => {
      const useCase = new UpdateUserUseCase(store);

      await expect(useCase.execute({ id: 99, name: 'X' })).rejects.toBeInstanceOf(NotFoundError);
      await expect(useCase.execute({ id: 99 })).rejects.toBeInstanceOf(NotFoundError);
    });
  });

  describe('DeleteUserUseCase', () => {
    it('should remove the record', async () => {
      await new DeleteUserUseCase(store).execute(1);

      expect(await store.findById(1)).toBeNull();
      expect((await store.list()).map((u) => u.id)).toEqual([2]);
    });

    it('should throw NotFoundError the second time', async () => {
      const useCase = new DeleteUserUseCase(store);
      await useCase.execute(1);

      await expect(useCase.execute(1)).rejects.toThrow('User not found');
    });
  });
});
