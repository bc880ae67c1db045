import { z } from 'zod';

export const productUrlSchema = z
  .string()
  .trim()
  .min(1, 'URL cannot be empty.')
  .refine(url => /^https?:\/\//i.test(url), 'URL must start with http:// or https://.')
  .pipe(z.string().url('URL is not valid.'));

export const targetPriceSchema = z
  .number({ invalid_type_error: 'Target price must be a number.' })
  .finite('Target price must be a finite number.')
  .positive('Target price must be a positive number.');

export const recipientEmailSchema = z.string().trim().email('Recipient must be a valid email address.');

export type ValidationResult<T> = { ok: true; value: T } | { ok: false; error: string };

export function validate<S extends z.ZodTypeAny>(schema: S, input: unknown): ValidationResult<z.output<S>> {
  const result = schema.safeParse(input);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return { ok: false, error: result.error.issues[0]?.message ?? 'Invalid input.' };
}
