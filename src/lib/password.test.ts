import { describe, expect, it } from 'vitest';
import { IntegrityError } from './errors';
import { hashPassword, verifyPassword } from './password';

// Existing $pbkdf2-sha256$ hash: 1000 rounds, salt "fixed-salt-16byt"
const LEGACY_HASH =
  '$pbkdf2-sha256$1000$Zml4ZWQtc2FsdC0xNmJ5dA$9AeGxKrrEIPlOqfcf4xag3VzgAaImC8zY.oh1Og3bGU';

describe('hashPassword', () => {
  it('writes the modular crypt format with the requested rounds', async () => {
    const hash = await hashPassword('secret1', 1000);
    expect(hash).toMatch(/^\$pbkdf2-sha256\$1000\$[A-Za-z0-9./]+\$[A-Za-z0-9./]+$/);
  });

  it('defaults to 29000 rounds', async () => {
    const hash = await hashPassword('secret1');
    expect(hash.split('$')[2]).toBe('29000');
  });

  it('salts every hash', async () => {
    const first = await hashPassword('secret1', 1000);
    const second = await hashPassword('secret1', 1000);

    expect(first).not.toBe(second);
    expect(await verifyPassword('secret1', first)).toBe(true);
    expect(await verifyPassword('secret1', second)).toBe(true);
  });
});

describe('verifyPassword', () => {
  it('accepts the right password and rejects others', async () => {
    const hash = await hashPassword('secret1', 1000);

    expect(await verifyPassword('secret1', hash)).toBe(true);
    expect(await verifyPassword('secret2', hash)).toBe(false);
    expect(await verifyPassword('Secret1', hash)).toBe(false);
    expect(await verifyPassword('', hash)).toBe(false);
  });

  it('reads existing modular crypt hashes', async () => {
    expect(await verifyPassword('correct horse', LEGACY_HASH)).toBe(true);
    expect(await verifyPassword('correct horsE', LEGACY_HASH)).toBe(false);
  });

  it.each([
    ['an empty string', ''],
    ['a plain string', 'not-a-hash'],
    ['an unknown scheme', '$bcrypt$1000$c2FsdA$Y2hlY2tzdW0'],
    ['non-numeric rounds', '$pbkdf2-sha256$many$c2FsdA$Y2hlY2tzdW0'],
    ['out-of-range rounds', '$pbkdf2-sha256$99999999999$c2FsdA$Y2hlY2tzdW0'],
    ['a missing checksum', '$pbkdf2-sha256$1000$c2FsdA'],
    ['an extra segment', '$pbkdf2-sha256$1000$c2FsdA$Y2hlY2tzdW0$x'],
    ['an empty checksum', '$pbkdf2-sha256$1000$c2FsdA$a'],
    ['invalid characters', '$pbkdf2-sha256$1000$c2F*dA$Y2hlY2tzdW0'],
  ])('raises an integrity error for %s', async (_label, hash) => {
    await expect(verifyPassword('secret1', hash)).rejects.toBeInstanceOf(
      IntegrityError,
    );
  });
});
