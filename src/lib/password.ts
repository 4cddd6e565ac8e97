import { pbkdf2, randomBytes, timingSafeEqual } from 'node:crypto';
import { promisify } from 'node:util';
import { IntegrityError } from './errors';

const pbkdf2Async = promisify(pbkdf2);

const SCHEME = 'pbkdf2-sha256';
const DIGEST = 'sha256';
const SALT_BYTES = 16;
const KEY_BYTES = 32;

export const DEFAULT_HASH_ROUNDS = 29000;
// Upper bound crypto.pbkdf2 accepts for iterations.
const MAX_ROUNDS = 2 ** 31 - 1;

// Modular crypt format:
// $pbkdf2-sha256$<rounds>$<salt>$<checksum>, unpadded base64 with '.' for '+'
function encodeAb64(bytes: Buffer): string {
  return bytes.toString('base64').replace(/=+$/, '').replace(/\+/g, '.');
}

function decodeAb64(text: string): Buffer {
  return Buffer.from(text.replace(/\./g, '+'), 'base64');
}

const AB64 = /^[A-Za-z0-9./]+$/;

type ParsedHash = {
  rounds: number;
  salt: Buffer;
  checksum: Buffer;
};

function parseHash(passwordHash: string): ParsedHash {
  const [empty, scheme, rounds, salt, checksum, ...rest] =
    passwordHash.split('$');

  if (
    empty !== '' ||
    scheme !== SCHEME ||
    rest.length > 0 ||
    rounds === undefined ||
    !/^[1-9]\d*$/.test(rounds) ||
    salt === undefined ||
    checksum === undefined ||
    !AB64.test(salt) ||
    !AB64.test(checksum)
  ) {
    throw new IntegrityError('Stored password hash is malformed');
  }

  const decoded = decodeAb64(checksum);
  if (decoded.length === 0) {
    throw new IntegrityError('Stored password hash is malformed');
  }

  const iterations = Number(rounds);
  if (iterations > MAX_ROUNDS) {
    throw new IntegrityError('Stored password hash is malformed');
  }

  return { rounds: iterations, salt: decodeAb64(salt), checksum: decoded };
}

export async function hashPassword(
  password: string,
  rounds = DEFAULT_HASH_ROUNDS,
): Promise<string> {
  const salt = randomBytes(SALT_BYTES);
  const key = await pbkdf2Async(password, salt, rounds, KEY_BYTES, DIGEST);
  return `$${SCHEME}$${rounds}$${encodeAb64(salt)}$${encodeAb64(key)}`;
}

/**
 * Resolves to false on a wrong password. Rejects with an IntegrityError
 * only when `passwordHash` is not a hash this module can read.
 */
export async function verifyPassword(
  password: string,
  passwordHash: string,
): Promise<boolean> {
  const { rounds, salt, checksum } = parseHash(passwordHash);
  const key = await pbkdf2Async(
    password,
    salt,
    rounds,
    checksum.length,
    DIGEST,
  );
  return timingSafeEqual(key, checksum);
}
