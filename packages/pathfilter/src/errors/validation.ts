/**
 * Zod validation wrapper for options objects.
 */
import { type ZodError, type ZodType } from "zod";

import { ValidationError, type ValidationIssue } from "./index";

function zodIssuesToValidationIssues(error: ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
    code: issue.code,
  }));
}

/**
 * Parses options against a schema, applying its defaults.
 *
 * @param label - Name of the options object, used in the error message
 * @throws ValidationError listing every failing option
 *
 * @example
 * ```typescript
 * const config = validateOptions(translatorConfigSchema, options, "translateFilter");
 * ```
 */
export function validateOptions<T>(
  schema: ZodType<T>,
  options: unknown,
  label: string,
): T {
  const result = schema.safeParse(options);

  if (result.success) {
    return result.data;
  }

  throw new ValidationError(
    `Invalid ${label} options: ${result.error.message}`,
    zodIssuesToValidationIssues(result.error),
    { cause: result.error },
  );
}
