import { readFileSync } from 'node:fs';
import { Result, err, ok } from 'neverthrow';
import { z } from 'zod';

const analyzerProgramSchema = z.object({
  command: z.string().min(1),
  args: z.array(z.string()).default([]),
  // Jar, script or binary that must exist before the command is launched
  artifact: z.string().min(1).optional(),
  acceptsModel: z.boolean().default(false),
  description: z.string().optional(),
});

export const analyzerCatalogSchema = z
  .record(z.string().min(1), analyzerProgramSchema)
  .refine((catalog) => Object.keys(catalog).length > 0, {
    message: 'At least one analyzer must be configured',
  });

export type AnalyzerProgram = z.infer<typeof analyzerProgramSchema>;
export type AnalyzerCatalog = z.infer<typeof analyzerCatalogSchema>;

const safeReadFile = Result.fromThrowable(
  (path: string) => readFileSync(path, 'utf8'),
  (error) => `Cannot read analyzer catalog: ${error instanceof Error ? error.message : String(error)}`
);

const safeJsonParse = Result.fromThrowable(
  (raw: string): unknown => JSON.parse(raw),
  (error) => `Analyzer catalog is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
);

export function parseAnalyzerCatalog(raw: unknown): Result<AnalyzerCatalog, string> {
  const validation = analyzerCatalogSchema.safeParse(raw);
  if (!validation.success) {
    return err(
      validation.error.issues
        .map((issue) => `${issue.path.map(String).join('.') || 'catalog'}: ${issue.message}`)
        .join('; ')
    );
  }

  return ok(validation.data);
}

export function loadAnalyzerCatalog(path: string): Result<AnalyzerCatalog, string> {
  return safeReadFile(path).andThen(safeJsonParse).andThen(parseAnalyzerCatalog);
}
