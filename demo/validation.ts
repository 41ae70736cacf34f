import { BadRequestException } from '@nestjs/common';
import { z } from 'zod';

export const nonBlank = (field: string) =>
  z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .refine((value) => value.trim() !== '', `${field} must not be blank`);

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; errors: Record<string, string> };

/** First issue per field; issues on the whole input are reported under `root`. */
export function validateInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  root = 'body',
): ValidationResult<T> {
  const parsed = schema.safeParse(input);
  if (parsed.success) {
    return { ok: true, value: parsed.data };
  }
  const errors: Record<string, string> = {};
  for (const issue of parsed.error.issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : root;
    if (!(field in errors)) errors[field] = issue.message;
  }
  return { ok: false, errors };
}

export function validInputOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, root?: string): T {
  const result = validateInput(schema, input, root);
  if (!result.ok) {
    throw new BadRequestException({
      message: 'Validation failed',
      code: 'VALIDATION_FAILED',
      validationErrors: result.errors,
    });
  }
  return result.value;
}
