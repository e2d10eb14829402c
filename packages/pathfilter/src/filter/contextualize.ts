/**
 * Operator contextualization.
 *
 * Turns an operator, a field path and a value list into an executable
 * test against entities resolved through a runtime context. A field
 * reached across a to-many hop yields several candidates; a test holds
 * when any candidate satisfies it.
 */
import { OperatorArityError } from "../errors/index";
import {
  acceptsValueCount,
  describeArity,
  type Operator,
  operatorArity,
} from "./operator";
import { type BooleanTest, type RuntimeContext } from "./runtime-context";

// ============================================================
// Value Helpers
// ============================================================

type Comparable = number | bigint | string | boolean;

function toComparable(value: unknown): Comparable | undefined {
  if (value instanceof Date) return value.getTime();
  switch (typeof value) {
    case "number":
    case "bigint":
    case "string":
    case "boolean": {
      return value;
    }
    default: {
      return undefined;
    }
  }
}

function isNumeric(value: Comparable): value is number | bigint {
  return typeof value === "number" || typeof value === "bigint";
}

function sign(less: boolean, greater: boolean): number {
  if (less) return -1;
  return greater ? 1 : 0;
}

/**
 * Orders two values, or returns undefined when they are not comparable.
 * Numbers, bigints and dates (as epoch milliseconds) compare with each
 * other; strings and booleans compare only with their own kind.
 */
export function compareValues(
  left: unknown,
  right: unknown,
): number | undefined {
  const a = toComparable(left);
  const b = toComparable(right);
  if (a === undefined || b === undefined) return undefined;

  if (isNumeric(a) && isNumeric(b)) return sign(a < b, a > b);
  if (typeof a === "string" && typeof b === "string") {
    return sign(a < b, a > b);
  }
  if (typeof a === "boolean" && typeof b === "boolean") {
    return sign(!a && b, a && !b);
  }
  return undefined;
}

export function valuesEqual(left: unknown, right: unknown): boolean {
  const order = compareValues(left, right);
  return order === undefined ? Object.is(left, right) : order === 0;
}

/**
 * Every value reached, including nullish ones, as a list.
 */
function candidatesOf(fieldValue: unknown): readonly unknown[] {
  if (Array.isArray(fieldValue)) return fieldValue;
  if (fieldValue === null || fieldValue === undefined) return [];
  return [fieldValue];
}

function presentCandidates(fieldValue: unknown): readonly unknown[] {
  return candidatesOf(fieldValue).filter(
    (candidate) => candidate !== null && candidate !== undefined,
  );
}

/**
 * Text a value matches as: strings as-is, numbers, bigints and booleans
 * through `String`, valid dates as ISO-8601. Anything else has none.
 */
export function stringForm(value: unknown): string | undefined {
  switch (typeof value) {
    case "string": {
      return value;
    }
    case "number":
    case "bigint":
    case "boolean": {
      return String(value);
    }
    default: {
      return value instanceof Date && !Number.isNaN(value.getTime()) ?
          value.toISOString()
        : undefined;
    }
  }
}

function lowerStringForm(value: unknown): string | undefined {
  return stringForm(value)?.toLowerCase();
}

// ============================================================
// Test Builders
// ============================================================

function fieldTest(
  fieldPath: string,
  context: RuntimeContext,
  test: (fieldValue: unknown) => boolean,
): BooleanTest {
  return (entity) => test(context.getFieldValue(entity, fieldPath));
}

function anyCandidate(
  fieldPath: string,
  context: RuntimeContext,
  test: (candidate: unknown) => boolean,
): BooleanTest {
  return fieldTest(fieldPath, context, (fieldValue) =>
    presentCandidates(fieldValue).some(test),
  );
}

function inverse(test: BooleanTest): BooleanTest {
  return (entity) => !test(entity);
}

type StringMatcher = (candidate: string, pattern: string) => boolean;

const startsWith: StringMatcher = (candidate, pattern) =>
  candidate.startsWith(pattern);
const endsWith: StringMatcher = (candidate, pattern) =>
  candidate.endsWith(pattern);
const includes: StringMatcher = (candidate, pattern) =>
  candidate.includes(pattern);

function matching(
  fieldPath: string,
  pattern: unknown,
  context: RuntimeContext,
  matcher: StringMatcher,
  caseInsensitive: boolean,
): BooleanTest {
  const normalize = caseInsensitive ? lowerStringForm : stringForm;
  const expected = normalize(pattern);
  return anyCandidate(fieldPath, context, (candidate) => {
    if (typeof candidate !== "string" || expected === undefined) return false;
    return matcher(
      caseInsensitive ? candidate.toLowerCase() : candidate,
      expected,
    );
  });
}

function membership(
  fieldPath: string,
  values: readonly unknown[],
  context: RuntimeContext,
  caseInsensitive: boolean,
): BooleanTest {
  if (caseInsensitive) {
    const expected = new Set(values.map((value) => lowerStringForm(value)));
    return anyCandidate(fieldPath, context, (candidate) => {
      const normalized = lowerStringForm(candidate);
      return normalized !== undefined && expected.has(normalized);
    });
  }
  return anyCandidate(fieldPath, context, (candidate) =>
    values.some((value) => valuesEqual(candidate, value)),
  );
}

function ordering(
  fieldPath: string,
  value: unknown,
  context: RuntimeContext,
  accept: (order: number) => boolean,
): BooleanTest {
  return anyCandidate(fieldPath, context, (candidate) => {
    const order = compareValues(candidate, value);
    return order !== undefined && accept(order);
  });
}

function range(
  fieldPath: string,
  lower: unknown,
  upper: unknown,
  context: RuntimeContext,
): BooleanTest {
  return anyCandidate(fieldPath, context, (candidate) => {
    const fromLower = compareValues(candidate, lower);
    const fromUpper = compareValues(candidate, upper);
    return (
      fromLower !== undefined &&
      fromUpper !== undefined &&
      fromLower >= 0 &&
      fromUpper <= 0
    );
  });
}

function collectionTest(
  fieldPath: string,
  context: RuntimeContext,
  test: (collection: readonly unknown[]) => boolean,
): BooleanTest {
  return fieldTest(fieldPath, context, (fieldValue) =>
    test(candidatesOf(fieldValue)),
  );
}

// ============================================================
// Contextualization
// ============================================================

/**
 * Validates the value count against the operator's arity rule.
 *
 * @throws OperatorArityError
 */
export function assertArity(
  operator: Operator,
  values: readonly unknown[],
): void {
  const arity = operatorArity(operator);
  if (!acceptsValueCount(arity, values.length)) {
    throw new OperatorArityError({
      operator,
      expected: describeArity(arity),
      actual: values.length,
    });
  }
}

/**
 * Builds the executable test for an operator applied to a field path.
 *
 * @throws OperatorArityError when `values` violates the operator's arity
 *
 * @example
 * ```typescript
 * const test = contextualizeOperator("ge", "age", [18], createObjectGraphContext());
 * test({ age: 21 }); // true
 * ```
 */
export function contextualizeOperator(
  operator: Operator,
  fieldPath: string,
  values: readonly unknown[],
  context: RuntimeContext,
): BooleanTest {
  assertArity(operator, values);
  const [first, second] = values;

  switch (operator) {
    case "eq": {
      return anyCandidate(fieldPath, context, (candidate) =>
        valuesEqual(candidate, first),
      );
    }
    case "in": {
      return membership(fieldPath, values, context, false);
    }
    case "inInsensitive": {
      return membership(fieldPath, values, context, true);
    }
    case "notIn": {
      return inverse(membership(fieldPath, values, context, false));
    }
    case "notInInsensitive": {
      return inverse(membership(fieldPath, values, context, true));
    }
    case "prefix": {
      return matching(fieldPath, first, context, startsWith, false);
    }
    case "prefixInsensitive": {
      return matching(fieldPath, first, context, startsWith, true);
    }
    case "postfix": {
      return matching(fieldPath, first, context, endsWith, false);
    }
    case "postfixInsensitive": {
      return matching(fieldPath, first, context, endsWith, true);
    }
    case "infix": {
      return matching(fieldPath, first, context, includes, false);
    }
    case "infixInsensitive": {
      return matching(fieldPath, first, context, includes, true);
    }
    case "isNull": {
      return fieldTest(
        fieldPath,
        context,
        (fieldValue) => presentCandidates(fieldValue).length === 0,
      );
    }
    case "notNull": {
      return fieldTest(
        fieldPath,
        context,
        (fieldValue) => presentCandidates(fieldValue).length > 0,
      );
    }
    case "lt": {
      return ordering(fieldPath, first, context, (order) => order < 0);
    }
    case "le": {
      return ordering(fieldPath, first, context, (order) => order <= 0);
    }
    case "gt": {
      return ordering(fieldPath, first, context, (order) => order > 0);
    }
    case "ge": {
      return ordering(fieldPath, first, context, (order) => order >= 0);
    }
    case "isTrue": {
      return () => true;
    }
    case "isFalse": {
      return () => false;
    }
    case "isEmpty": {
      return collectionTest(
        fieldPath,
        context,
        (collection) => collection.length === 0,
      );
    }
    case "notEmpty": {
      return collectionTest(
        fieldPath,
        context,
        (collection) => collection.length > 0,
      );
    }
    case "hasMember": {
      return collectionTest(fieldPath, context, (collection) =>
        collection.some((member) => valuesEqual(member, first)),
      );
    }
    case "hasNoMember": {
      return collectionTest(
        fieldPath,
        context,
        (collection) =>
          !collection.some((member) => valuesEqual(member, first)),
      );
    }
    case "between": {
      return range(fieldPath, first, second, context);
    }
    case "notBetween": {
      return inverse(range(fieldPath, first, second, context));
    }
  }
}
