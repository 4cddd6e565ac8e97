import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { Context } from '../context';
import type { Identity } from '../db/schemas/auth';
import type { AuthService } from '../lib/auth';
import { loggedIn } from '../middleware/loggedIn';
import {
  credentialsSchema,
  rejectInvalidPayload,
  type SuccessResponse,
} from '../types';

type TokenResponse = {
  accessToken: string;
  tokenType: 'bearer';
  expiresIn: number;
  user: Identity;
};

export const authRouter = (auth: AuthService) =>
  new Hono<Context>()
    .post(
      '/signup',
      zValidator('json', credentialsSchema, rejectInvalidPayload),
      async (c) => {
        const { username, password } = c.req.valid('json');
        const user = await auth.signup(username, password);

        return c.json<SuccessResponse<Identity>>({
          success: true,
          message: 'User created',
          data: user,
        });
      },
    )
    .post(
      '/login',
      zValidator('json', credentialsSchema, rejectInvalidPayload),
      async (c) => {
        const { username, password } = c.req.valid('json');
        const { token, expiresIn, user } = await auth.login(username, password);

        return c.json<SuccessResponse<TokenResponse>>(
          {
            success: true,
            message: 'Logged in',
            data: { accessToken: token, tokenType: 'bearer', expiresIn, user },
          },
          200,
        );
      },
    )
    .get('/me', loggedIn(auth), (c) => {
      return c.json<SuccessResponse<Identity>>({
        success: true,
        message: 'User fetched',
        data: c.get('user'),
      });
    });
