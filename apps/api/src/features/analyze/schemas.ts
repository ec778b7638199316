import { z } from 'zod';

export const analyzeRequestSchema = z.object({
  url: z.string().trim().min(1, 'url is required'),
  analyzer_type: z.string().trim().min(1).optional(),
  // Clients send a model for every kind; blank and null mean none
  model: z.string().trim().max(200).nullish(),
});

export const analysisResultSchema = z.object({
  left: z.number(),
  right: z.number(),
  message: z.string(),
  explanation: z.string(),
});

export const analyzeResponseSchema = z.object({
  results: analysisResultSchema,
  console_message: z.string(),
});

export type AnalyzeRequestSchema = z.infer<typeof analyzeRequestSchema>;
export type AnalyzeResponseSchema = z.infer<typeof analyzeResponseSchema>;
