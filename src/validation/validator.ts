import { z } from 'zod';
import { InvalidConfigurationError } from '../core/errors.js';

/**
 * Format zod issues as `path: message` lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((issue) => {
    const path = issue.path.join('.');
    return `${path || 'root'}: ${issue.message}`;
  });
}

/**
 * Validates a value against a Zod schema
 * @param schema - Schema to parse with
 * @param value - The raw value to validate
 * @param label - What is being validated, used in the error message
 * @returns The parsed value, with defaults applied
 * @throws {InvalidConfigurationError} If validation fails
 */
export function validateConfig<T extends z.ZodTypeAny>(
  schema: T,
  value: unknown,
  label: string
): z.infer<T> {
  const result = schema.safeParse(value);

  if (!result.success) {
    const issues = formatIssues(result.error);
    throw new InvalidConfigurationError(
      `Validation failed for ${label}:\n${issues.map((line) => `  - ${line}`).join('\n')}`,
      issues
    );
  }

  return result.data;
}
