import { describe, it, expect } from 'vitest';
import { Password } from '../password.js';

describe('Password', () => {
  it('should verify the password it hashed', async () => {
    const hash = await Password.hash('secret1');

    expect(hash).not.toContain('secret1');
    expect(await Password.verify('secret1', hash)).toBe(true);
  });

  it('should not verify a different password', async () => {
    const hash = await Password.hash('secret1');

    expect(await Password.verify('secret2', hash)).toBe(false);
  });

  it('should salt every hash', async () => {
    const [first, second] = await Promise.all([Password.hash('secret1'), Password.hash('secret1')]);

    expect(first).not.toBe(second);
  });

  it('should treat an unparseable hash as a mismatch', async () => {
    expect(await Password.verify('secret1', 'not-a-hash')).toBe(false);
  });
});
