import { z } from 'zod';
import { ROLES } from '../domain/index.js';

export const loginSchema = z.object({
  username: z.string().min(1).max(64),
  password: z.string().min(1).max(1024),
});

const passwordField = z.string().min(8, 'Password must be at least 8 characters').max(1024);

export const createUserSchema = z.object({
  username: z.string().trim().regex(/^[a-zA-Z0-9_.-]{3,64}$/, 'Username must be 3-64 characters of [a-zA-Z0-9_.-]'),
  password: passwordField,
  role: z.enum(ROLES),
});

export type CreateUserInput = z.infer<typeof createUserSchema>;

export const changePasswordSchema = z.object({
  password: passwordField,
});

export const usernameParamsSchema = z.object({
  username: z.string().min(1).max(64),
});
