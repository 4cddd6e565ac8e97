import type { RecordStore } from '../db/store';
import { toIdentity, type Identity } from '../db/schemas/auth';
import {
  ConflictError,
  InvalidCredentialsError,
  InvalidTokenError,
  MissingCredentialError,
  PrincipalNotFoundError,
  ValidationError,
  WeakPasswordError,
} from './errors';
import { DEFAULT_HASH_ROUNDS, hashPassword, verifyPassword } from './password';
import type { TokenService } from './token';

export const MIN_PASSWORD_LENGTH = 6;

export type LoginResult = {
  token: string;
  expiresIn: number;
  user: Identity;
};

export class AuthService {
  constructor(
    private readonly store: RecordStore,
    private readonly tokens: TokenService,
    private readonly hashRounds = DEFAULT_HASH_ROUNDS,
  ) {}

  async signup(username: string, password: string): Promise<Identity> {
    const name = username.trim();
    const secret = password.trim();
    if (!name) {
      throw new ValidationError('Username is required');
    }
    if (secret.length < MIN_PASSWORD_LENGTH) {
      throw new WeakPasswordError(MIN_PASSWORD_LENGTH);
    }

    // Checked again under the store lock by createUserIfAbsent.
    if (await this.store.findUserByUsername(name)) {
      throw new ConflictError('Username already exists');
    }

    const passwordHash = await hashPassword(secret, this.hashRounds);
    const user = await this.store.createUserIfAbsent(name, passwordHash);
    if (!user) {
      throw new ConflictError('Username already exists');
    }
    return toIdentity(user);
  }

  async login(username: string, password: string): Promise<LoginResult> {
    const name = username.trim();
    const secret = password.trim();
    if (!name || !secret) {
      throw new ValidationError('Username and password are required');
    }

    const user = await this.store.findUserByUsername(name);
    if (!user || !(await verifyPassword(secret, user.passwordHash))) {
      throw new InvalidCredentialsError();
    }

    const { token, expiresIn } = await this.tokens.issue(user.username);
    return { token, expiresIn, user: toIdentity(user) };
  }

  /**
   * Resolves a bearer token to the identity it names. Looks the user up on
   * every call; nothing is cached between requests.
   */
  async authenticate(bearer: string | undefined): Promise<Identity> {
    if (!bearer) {
      throw new MissingCredentialError();
    }

    let username: string;
    try {
      username = await this.tokens.verify(bearer);
    } catch (err) {
      if (err instanceof InvalidTokenError) {
        throw err;
      }
      throw new InvalidTokenError({ cause: err });
    }

    const user = await this.store.findUserByUsername(username);
    if (!user) {
      throw new PrincipalNotFoundError();
    }
    return toIdentity(user);
  }
}
