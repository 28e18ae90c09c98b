/**
 * Zod request validation for Express routes
 */

import { ZodError, ZodSchema } from "zod";
import { ValidationError } from "../../core/errors";

export interface ValidationIssue {
  path: string;
  message: string;
  code: string;
}

export function describeZodError(error: ZodError): ValidationIssue[] {
  return error.errors.map((err) => ({
    path: err.path.join("."),
    message: err.message,
    code: err.code,
  }));
}

/**
 * Parse a request body, throwing ValidationError (400) when it does not match.
 */
export function parseBody<T>(schema: ZodSchema<T>, body: unknown): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = describeZodError(result.error);
    const summary = issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; ");
    throw new ValidationError(summary, { issues });
  }
  return result.data;
}
