import { createMiddleware } from 'hono/factory';
import type { LoggedInContext } from '../context';
import type { AuthService } from '../lib/auth';

export function readBearerToken(header: string | undefined): string | undefined {
  const match = header?.match(/^Bearer\s+(.+)$/i);
  const token = match?.[1]?.trim();
  return token ? token : undefined;
}

export const loggedIn = (auth: AuthService) =>
  createMiddleware<LoggedInContext>(async (c, next) => {
    const user = await auth.authenticate(
      readBearerToken(c.req.header('Authorization')),
    );
    c.set('user', user);
    await next();
  });
