import { sign, verify } from 'hono/jwt';
import { InvalidTokenError } from './errors';

export type TokenAlgorithm = 'HS256' | 'HS384' | 'HS512';

export type TokenServiceOptions = {
  secret: string;
  algorithm: TokenAlgorithm;
  expireMinutes: number;
  now?: () => Date;
};

export type IssuedToken = {
  token: string;
  expiresIn: number; // seconds
};

/**
 * Stateless bearer tokens: a signed `{ sub, iat, exp }` JWT. Nothing is kept
 * server-side, so a token stays valid until `exp` passes.
 */
export class TokenService {
  private readonly secret: string;
  private readonly algorithm: TokenAlgorithm;
  private readonly lifetimeSeconds: number;
  private readonly now: () => Date;

  constructor(options: TokenServiceOptions) {
    this.secret = options.secret;
    this.algorithm = options.algorithm;
    this.lifetimeSeconds = Math.floor(options.expireMinutes * 60);
    this.now = options.now ?? (() => new Date());
  }

  async issue(subject: string): Promise<IssuedToken> {
    const issuedAt = Math.floor(this.now().getTime() / 1000);
    const token = await sign(
      {
        sub: subject,
        iat: issuedAt,
        exp: issuedAt + this.lifetimeSeconds,
      },
      this.secret,
      this.algorithm,
    );
    return { token, expiresIn: this.lifetimeSeconds };
  }

  /**
   * Resolves to the token's subject. Every failure (bad signature, malformed
   * token, expiry, missing subject) rejects with the same InvalidTokenError.
   */
  async verify(token: string): Promise<string> {
    let payload: Awaited<ReturnType<typeof verify>>;
    try {
      payload = await verify(token, this.secret, this.algorithm);
    } catch (err) {
      throw new InvalidTokenError({ cause: err });
    }

    const subject = payload.sub;
    if (typeof subject !== 'string' || subject === '') {
      throw new InvalidTokenError();
    }
    return subject;
  }
}
