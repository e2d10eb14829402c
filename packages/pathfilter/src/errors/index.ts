/**
 * pathfilter error hierarchy
 *
 * All errors extend PathFilterError with:
 * - `code`: Machine-readable error code for programmatic handling
 * - `category`: Classification for error handling strategies
 * - `suggestion`: Optional recovery guidance
 * - `details`: Structured context about the error
 *
 * @example
 * ```typescript
 * try {
 *   predicate.negate();
 * } catch (error) {
 *   if (isPathFilterError(error)) {
 *     console.error(error.toUserMessage());
 *   }
 * }
 * ```
 */

// ============================================================
// Types
// ============================================================

/**
 * Error category for programmatic handling.
 *
 * - `user`: Caused by invalid input or incorrect usage. Recoverable by fixing the call.
 * - `system`: The filter cannot be executed by the target backend.
 */
export type ErrorCategory = "user" | "system";

/**
 * Options for PathFilterError constructor.
 */
export type PathFilterErrorOptions = Readonly<{
  /** Structured context about the error */
  details?: Record<string, unknown>;
  /** Error category for handling strategies */
  category: ErrorCategory;
  /** Recovery guidance */
  suggestion?: string;
  /** Underlying cause of the error */
  cause?: unknown;
}>;

function formatCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.stack ?? cause.message;
  }
  if (typeof cause === "string") {
    return cause;
  }
  if (
    typeof cause === "number" ||
    typeof cause === "boolean" ||
    typeof cause === "bigint"
  ) {
    return String(cause);
  }
  if (cause === undefined) {
    return "Unknown cause";
  }

  try {
    return JSON.stringify(cause);
  } catch (error) {
    return `Unserializable cause: ${
      error instanceof Error ? error.message : "Unknown error"
    }`;
  }
}

// ============================================================
// Base Error
// ============================================================

/**
 * Base error class for all pathfilter errors.
 */
export class PathFilterError extends Error {
  /** Machine-readable error code (e.g., "INVALID_PATH") */
  readonly code: string;

  readonly category: ErrorCategory;

  readonly details: Readonly<Record<string, unknown>>;

  readonly suggestion?: string;

  constructor(message: string, code: string, options: PathFilterErrorOptions) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = "PathFilterError";
    this.code = code;
    this.category = options.category;
    this.details = Object.freeze(options.details ?? {});
    if (options.suggestion !== undefined) {
      this.suggestion = options.suggestion;
    }
  }

  /**
   * Returns the message followed by the suggestion, if any.
   */
  toUserMessage(): string {
    if (this.suggestion) {
      return `${this.message}\n\nSuggestion: ${this.suggestion}`;
    }
    return this.message;
  }

  /**
   * Returns a multi-line representation for logs.
   */
  toLogString(): string {
    const lines = [
      `[${this.code}] ${this.message}`,
      `  Category: ${this.category}`,
    ];

    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`);
    }

    const detailKeys = Object.keys(this.details);
    if (detailKeys.length > 0) {
      lines.push(`  Details: ${JSON.stringify(this.details)}`);
    }

    if (this.cause) {
      lines.push(`  Cause: ${formatCause(this.cause)}`);
    }

    return lines.join("\n");
  }
}

// ============================================================
// Path Errors (category: "user")
// ============================================================

/**
 * Thrown when a traversal path cannot be built: no steps, or a hop
 * continues past a field that is not a relationship.
 */
export class InvalidPathError extends PathFilterError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, "INVALID_PATH", {
      details,
      category: "user",
      suggestion: `A path needs at least one step, and every step but the last must name a relationship.`,
      cause: options?.cause,
    });
    this.name = "InvalidPathError";
  }
}

/**
 * Thrown when a field name is not an attribute or relationship of an entity.
 */
export class UnknownFieldError extends PathFilterError {
  constructor(entity: string, field: string, options?: { cause?: unknown }) {
    super(`Unknown field "${field}" on entity "${entity}"`, "UNKNOWN_FIELD", {
      details: { entity, field },
      category: "user",
      suggestion: `Verify "${field}" is declared in the schema or relationships of "${entity}".`,
      cause: options?.cause,
    });
    this.name = "UnknownFieldError";
  }
}

/**
 * Thrown when an entity name is not registered in the entity dictionary.
 */
export class EntityNotFoundError extends PathFilterError {
  constructor(entity: string, options?: { cause?: unknown }) {
    super(`Entity not found: ${entity}`, "ENTITY_NOT_FOUND", {
      details: { entity },
      category: "user",
      suggestion: `Verify "${entity}" was passed to createEntityDictionary() and is spelled correctly.`,
      cause: options?.cause,
    });
    this.name = "EntityNotFoundError";
  }
}

// ============================================================
// Operator Errors (category: "user")
// ============================================================

/**
 * Thrown when an operator receives a number of values its arity rule rejects.
 *
 * @example
 * ```typescript
 * contextualizeOperator("isNull", "name", ["x"], context);
 * // OperatorArityError: Operator "isNull" expects exactly 0 values, got 1
 * ```
 */
export class OperatorArityError extends PathFilterError {
  constructor(
    details: Readonly<{
      operator: string;
      expected: string;
      actual: number;
    }>,
    options?: { cause?: unknown },
  ) {
    super(
      `Operator "${details.operator}" expects ${details.expected} values, got ${details.actual}`,
      "OPERATOR_ARITY",
      {
        details,
        category: "user",
        suggestion: `Pass ${details.expected} values to "${details.operator}".`,
        cause: options?.cause,
      },
    );
    this.name = "OperatorArityError";
  }
}

/**
 * Thrown when negation is requested for an operator with no single-operator inverse.
 */
export class UnsupportedNegationError extends PathFilterError {
  constructor(operator: string, options?: { cause?: unknown }) {
    super(
      `Operator "${operator}" has no logical inverse`,
      "UNSUPPORTED_NEGATION",
      {
        details: { operator },
        category: "user",
        suggestion: `Wrap the predicate in a NOT expression instead of negating it in place.`,
        cause: options?.cause,
      },
    );
    this.name = "UnsupportedNegationError";
  }
}

/**
 * Thrown when a predicate accessor is called outside its contract,
 * such as reading an escaped string value from a predicate with no values.
 */
export class PredicateUsageError extends PathFilterError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, "PREDICATE_USAGE", {
      details,
      category: "user",
      suggestion: `Only read escaped string values from matching predicates holding exactly one value.`,
      cause: options?.cause,
    });
    this.name = "PredicateUsageError";
  }
}

// ============================================================
// Configuration Errors (category: "user")
// ============================================================

/**
 * Validation issue from Zod.
 */
export type ValidationIssue = Readonly<{
  /** Path to the invalid option (e.g., "escapeCharacter") */
  path: string;
  message: string;
  /** Zod issue code */
  code?: string;
}>;

/**
 * Thrown when an options object fails schema validation.
 */
export class ValidationError extends PathFilterError {
  declare readonly details: Readonly<{ issues: readonly ValidationIssue[] }>;

  constructor(
    message: string,
    issues: readonly ValidationIssue[],
    options?: { cause?: unknown },
  ) {
    const fieldList =
      issues.length > 0 ?
        issues.map((issue) => issue.path || "(root)").join(", ")
      : "unknown";

    super(message, "VALIDATION_ERROR", {
      details: { issues },
      category: "user",
      suggestion: `Check the following options: ${fieldList}. See error.details.issues for specific validation failures.`,
      cause: options?.cause,
    });
    this.name = "ValidationError";
  }
}

/**
 * Thrown when entity metadata is inconsistent.
 */
export class ConfigurationError extends PathFilterError {
  constructor(
    message: string,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "CONFIGURATION_ERROR", {
      details,
      category: "user",
      suggestion:
        options?.suggestion ?? `Review your entity definitions for errors.`,
      cause: options?.cause,
    });
    this.name = "ConfigurationError";
  }
}

// ============================================================
// Translation Errors (category: "system")
// ============================================================

/**
 * Thrown when a predicate cannot be rendered as SQL.
 */
export class UnsupportedPredicateError extends PathFilterError {
  constructor(
    message: string,
    details: Readonly<Record<string, unknown>> = {},
    options?: { cause?: unknown; suggestion?: string },
  ) {
    super(message, "UNSUPPORTED_PREDICATE", {
      details,
      category: "system",
      suggestion:
        options?.suggestion ??
        `Evaluate this predicate in memory with createInMemoryFilter() instead.`,
      cause: options?.cause,
    });
    this.name = "UnsupportedPredicateError";
  }
}

// ============================================================
// Utility Functions
// ============================================================

export function isPathFilterError(error: unknown): error is PathFilterError {
  return error instanceof PathFilterError;
}

/**
 * Check if error is recoverable by changing the call that raised it.
 */
export function isUserRecoverable(error: unknown): boolean {
  return isPathFilterError(error) && error.category === "user";
}

export function isSystemError(error: unknown): boolean {
  return isPathFilterError(error) && error.category === "system";
}

/**
 * Extract suggestion from error if available.
 */
export function getErrorSuggestion(error: unknown): string | undefined {
  return isPathFilterError(error) ? error.suggestion : undefined;
}
