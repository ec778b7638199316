import { z } from 'zod';

export const credentialsSchema = z.object({
  username: z.string().trim().min(1, 'username is required').max(64),
  password: z.string().min(1, 'password is required').max(256),
});

export const checkAuthResponseSchema = z.object({
  authenticated: z.literal(true),
  user: z.string(),
});

export type Credentials = z.infer<typeof credentialsSchema>;
export type CheckAuthResponse = z.infer<typeof checkAuthResponseSchema>;
