import { z } from 'zod';

/**
 * Shape of the persisted polynomial document.
 *
 * Objects pass unknown keys through so that a rewrite keeps whatever else the
 * file carried; only `polynomial.c` is ever changed after the first write.
 */
export const polynomialSchema = z
  .object({
    a: z.number().int(),
    b: z.number().int(),
    c: z.number().nullable(),
    form: z.string(),
  })
  .passthrough();

export const rootsBase64Schema = z
  .object({
    alpha: z.string(),
    beta: z.string(),
  })
  .passthrough();

export const polynomialDocumentSchema = z
  .object({
    polynomial: polynomialSchema,
    roots_base64: rootsBase64Schema,
  })
  .passthrough();

export type PolynomialDocument = z.infer<typeof polynomialDocumentSchema>;

export const roundtripOptionsSchema = z
  .object({
    file: z.string().min(1).optional(),
    cwd: z.string().min(1).optional(),
    debug: z.boolean().optional(),
  })
  .strict();

/** Formats zod issues as `path: message` strings for error details. */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`);
}
