import { z } from 'zod';

const envSchema = z.object({
  // Indentation of JSON written by the server; 0 writes compact JSON.
  PO_JSON_INDENT: z.coerce.number().int().min(0).max(8).default(2),
  PO_MIN_BATCH_SIZE: z.coerce.number().int().positive().default(50),
});

export interface ServerConfig {
  jsonIndent: number;
  minBatchSize: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = envSchema.safeParse({
    PO_JSON_INDENT: env.PO_JSON_INDENT || undefined,
    PO_MIN_BATCH_SIZE: env.PO_MIN_BATCH_SIZE || undefined,
  });
  if (!parsed.success) {
    const details = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return {
    jsonIndent: parsed.data.PO_JSON_INDENT,
    minBatchSize: parsed.data.PO_MIN_BATCH_SIZE,
  };
}
