import { z } from 'zod';
import type { JsonValue } from '../config.js';

/**
 * CLI Validation Schemas
 *
 * Options arrive from commander as strings; these schemas coerce and check
 * them before a worker is constructed.
 */

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ])
);

/**
 * Worker parameters: a JSON object of arbitrary JSON values.
 */
export const workerParamsSchema = z.record(jsonValueSchema);

// commander hands numbers over as strings
const numericOption = z.union([z.string(), z.number()]);

export const runCommandSchema = z.object({
  workerType: z.string().min(1),
  logDir: z.string().optional(),
  statsDir: z.string().optional(),
  waitSeconds: numericOption.pipe(z.coerce.number().nonnegative()).optional(),
  maxCycles: numericOption.pipe(z.coerce.number().int().nonnegative()).optional(),
  workerParams: z.string(),
  workerId: z.string().min(1).optional(),
  verbose: z.boolean().optional(),
  managed: z.boolean().optional(),
});

export type RunCommandOptions = z.input<typeof runCommandSchema>;

export const statusCommandSchema = z.object({
  statsDir: z.string(),
  workerId: z.string().min(1).optional(),
  format: z.enum(['text', 'json']),
});

export type StatusCommandOptions = z.infer<typeof statusCommandSchema>;

/**
 * Parses the `--worker-params` JSON string.
 *
 * @throws Error if the string is not JSON or not an object of JSON values
 */
export function parseWorkerParams(raw: string): z.infer<typeof workerParamsSchema> {
  if (!raw.trim()) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(`Invalid JSON in worker parameters: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = workerParamsSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Worker parameters must be a JSON object:\n${formatZodError(result.error)}`);
  }
  return result.data;
}

/**
 * Helper function to validate and format Zod errors
 */
export function formatZodError(error: z.ZodError): string {
  const errors = error.errors.map((err) => {
    const path = err.path.join('.');
    return `  - ${path || '(root)'}: ${err.message}`;
  });

  return `Validation failed:\n${errors.join('\n')}`;
}
