import { z, type ZodError, type ZodSchema } from 'zod';
import { err, ok, type Result } from '../types/index.js';

/**
 * Individual validation error.
 */
export interface ValidationError {
  path: string;
  message: string;
  code: string;
}

/**
 * Convert Zod errors to our ValidationError format.
 */
function formatZodErrors(error: ZodError): ValidationError[] {
  return error.errors.map(e => ({
    path: e.path.join('.'),
    message: e.message,
    code: e.code,
  }));
}

/**
 * Generic validation function for Zod schemas.
 */
export function validate<T>(
  schema: ZodSchema<T>,
  data: unknown
): Result<T, ValidationError[]> {
  const result = schema.safeParse(data);

  if (result.success) {
    return ok(result.data);
  }

  return err(formatZodErrors(result.error));
}

// Command option schemas

export const taskNameOptionsSchema = z.object({
  name: z.string().min(1, 'Task name cannot be empty').optional(),
});

export type TaskNameOptions = z.infer<typeof taskNameOptionsSchema>;

export const installCommandOptionsSchema = taskNameOptionsSchema.extend({
  script: z.string().min(1, 'Script path cannot be empty').optional(),
  workingDir: z.string().min(1, 'Working directory cannot be empty').optional(),
  /** Undefined means ask the operator */
  start: z.boolean().optional(),
});

export type InstallCommandOptions = z.infer<typeof installCommandOptionsSchema>;
