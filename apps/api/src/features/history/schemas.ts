import { z } from 'zod';

export const historyItemSchema = z.object({
  url: z.string(),
  analyzer_type: z.string(),
  model: z.string().nullable(),
  left: z.number(),
  right: z.number(),
  message: z.string(),
  explanation: z.string(),
  date: z.string(),
});

export const historyResponseSchema = z.array(historyItemSchema);

export type HistoryItemSchema = z.infer<typeof historyItemSchema>;
