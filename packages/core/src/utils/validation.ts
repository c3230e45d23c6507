import type { z } from 'zod';
import { ParloopError, ErrorCode } from '../errors.js';

export function validate<T>(schema: z.ZodType<T>, data: unknown, fieldName?: string): T {
  const result = schema.safeParse(data);
  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues
    .map((issue, idx) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `  ${String(idx + 1)}. [${path}] ${issue.message}`;
    })
    .join('\n');

  throw new ParloopError(
    `Validation failed${fieldName ? ` for ${fieldName}` : ''}:\n${issues}`,
    ErrorCode.INPUT_INVALID,
    `Invalid data${fieldName ? ` in ${fieldName}` : ''}: ${String(result.error.issues.length)} issue(s) found`,
    { field: fieldName }
  );
}
