import { z } from 'zod';

export const healthResponseSchema = z.object({
  status: z.enum(['healthy', 'unhealthy']),
  timestamp: z.number(),
  services: z.object({
    store: z.boolean(),
  }),
});
