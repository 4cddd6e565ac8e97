import { z } from 'zod';
import { ValidationError } from './lib/errors';

export type SuccessResponse<T = void> = {
  success: true;
  message: string;
} & (T extends void ? object : { data: T });

export type ErrorResponse = {
  success: false;
  error: string;
  code?: string;
};

export const credentialsSchema = z.object({
  username: z.string().min(1).max(128),
  password: z.string().min(1).max(128),
});

export const chatRequestSchema = z.object({
  message: z.string().min(1).max(4000),
});

export const historyQuerySchema = z.object({
  limit: z.number({ coerce: true }).int().optional(),
});

export type ChatItem = {
  id: number;
  role: string;
  content: string;
  createdAt: Date;
};

/** zValidator hook: reject a payload that fails its schema with a 422. */
export function rejectInvalidPayload(result: { success: boolean }): void {
  if (!result.success) {
    throw new ValidationError('Invalid request payload.', 422);
  }
}
