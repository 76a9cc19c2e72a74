import { ZodType, ZodTypeDef } from 'zod';
import { ValidationException } from './exceptions';

/**
 * Parse `input` against a Zod schema, turning the first issue into a ValidationException.
 *
 * @example
 * const record = parseOrThrow(statRecordSchema, raw, 'stat record');
 */
export function parseOrThrow<Output, Input>(
  schema: ZodType<Output, ZodTypeDef, Input>,
  input: unknown,
  label: string
): Output {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    // Use first error message for simpler caller handling
    const firstIssue = parsed.error.issues[0];
    const where = firstIssue && firstIssue.path.length > 0 ? `${firstIssue.path.join('.')}: ` : '';
    const message = firstIssue ? firstIssue.message : 'Validation failed';
    throw new ValidationException(`Invalid ${label}: ${where}${message}`);
  }
  return parsed.data;
}
