/**
 * Operator taxonomy.
 *
 * A closed set of comparison and matching operators. Each tag carries an
 * arity rule, a presentation token and an entry in the negation table.
 * Every table here is an exhaustive switch or a full Record, so adding a
 * tag fails compilation until it is classified everywhere.
 */
import { UnsupportedNegationError } from "../errors/index";

// ============================================================
// Tags
// ============================================================

export const OPERATORS = [
  "eq",
  "in",
  "inInsensitive",
  "notIn",
  "notInInsensitive",
  "prefix",
  "prefixInsensitive",
  "postfix",
  "postfixInsensitive",
  "infix",
  "infixInsensitive",
  "isNull",
  "notNull",
  "lt",
  "le",
  "gt",
  "ge",
  "isTrue",
  "isFalse",
  "isEmpty",
  "notEmpty",
  "hasMember",
  "hasNoMember",
  "between",
  "notBetween",
] as const;

export type Operator = (typeof OPERATORS)[number];

/**
 * The six string-matching operators.
 */
export type MatchingOperator = Extract<
  Operator,
  | "prefix"
  | "prefixInsensitive"
  | "postfix"
  | "postfixInsensitive"
  | "infix"
  | "infixInsensitive"
>;

const OPERATOR_SET: ReadonlySet<string> = new Set(OPERATORS);

export function isOperator(value: unknown): value is Operator {
  return typeof value === "string" && OPERATOR_SET.has(value);
}

export function isMatchingOperator(
  operator: Operator,
): operator is MatchingOperator {
  switch (operator) {
    case "prefix":
    case "prefixInsensitive":
    case "postfix":
    case "postfixInsensitive":
    case "infix":
    case "infixInsensitive": {
      return true;
    }
    default: {
      return false;
    }
  }
}

// ============================================================
// Presentation
// ============================================================

const OPERATOR_TOKENS: Readonly<Record<Operator, string>> = {
  eq: "eq",
  in: "in",
  inInsensitive: "ini",
  notIn: "not",
  notInInsensitive: "noti",
  prefix: "prefix",
  prefixInsensitive: "prefixi",
  postfix: "postfix",
  postfixInsensitive: "postfixi",
  infix: "infix",
  infixInsensitive: "infixi",
  isNull: "isnull",
  notNull: "notnull",
  lt: "lt",
  le: "le",
  gt: "gt",
  ge: "ge",
  isTrue: "true",
  isFalse: "false",
  isEmpty: "isempty",
  notEmpty: "notempty",
  hasMember: "hasmember",
  hasNoMember: "hasnomember",
  between: "between",
  notBetween: "notbetween",
};

export function operatorToken(operator: Operator): string {
  return OPERATOR_TOKENS[operator];
}

// ============================================================
// Arity
// ============================================================

/**
 * Accepted value count: `min` up to `max` inclusive, unbounded when `max`
 * is undefined.
 */
export type Arity = Readonly<{
  min: number;
  max: number | undefined;
}>;

const NO_VALUES: Arity = { min: 0, max: 0 };
const ONE_VALUE: Arity = { min: 1, max: 1 };
const TWO_VALUES: Arity = { min: 2, max: 2 };
const ONE_OR_MORE: Arity = { min: 1, max: undefined };

export function operatorArity(operator: Operator): Arity {
  switch (operator) {
    case "isNull":
    case "notNull":
    case "isTrue":
    case "isFalse":
    case "isEmpty":
    case "notEmpty": {
      return NO_VALUES;
    }
    case "eq":
    case "prefix":
    case "prefixInsensitive":
    case "postfix":
    case "postfixInsensitive":
    case "infix":
    case "infixInsensitive":
    case "lt":
    case "le":
    case "gt":
    case "ge":
    case "hasMember":
    case "hasNoMember": {
      return ONE_VALUE;
    }
    case "in":
    case "inInsensitive":
    case "notIn":
    case "notInInsensitive": {
      return ONE_OR_MORE;
    }
    case "between":
    case "notBetween": {
      return TWO_VALUES;
    }
  }
}

/**
 * Human-readable arity, e.g. "exactly 1" or "at least 1".
 */
export function describeArity(arity: Arity): string {
  if (arity.max === undefined) return `at least ${arity.min}`;
  if (arity.min === arity.max) return `exactly ${arity.min}`;
  return `between ${arity.min} and ${arity.max}`;
}

export function acceptsValueCount(arity: Arity, count: number): boolean {
  return count >= arity.min && (arity.max === undefined || count <= arity.max);
}

// ============================================================
// Negation
// ============================================================

/**
 * Inverse operator, or undefined when the operator has no single-operator
 * inverse.
 */
function inverseOf(operator: Operator): Operator | undefined {
  switch (operator) {
    case "ge": {
      return "lt";
    }
    case "gt": {
      return "le";
    }
    case "le": {
      return "gt";
    }
    case "lt": {
      return "ge";
    }
    case "in": {
      return "notIn";
    }
    case "notIn": {
      return "in";
    }
    case "isTrue": {
      return "isFalse";
    }
    case "isFalse": {
      return "isTrue";
    }
    case "isNull": {
      return "notNull";
    }
    case "notNull": {
      return "isNull";
    }
    case "eq":
    case "inInsensitive":
    case "notInInsensitive":
    case "prefix":
    case "prefixInsensitive":
    case "postfix":
    case "postfixInsensitive":
    case "infix":
    case "infixInsensitive":
    case "isEmpty":
    case "notEmpty":
    case "hasMember":
    case "hasNoMember":
    case "between":
    case "notBetween": {
      return undefined;
    }
  }
}

/**
 * Returns the logical inverse of an operator.
 *
 * @throws UnsupportedNegationError for equality, matching and the other
 *   operators without a single-operator inverse
 */
export function negateOperator(operator: Operator): Operator {
  const inverse = inverseOf(operator);
  if (inverse === undefined) {
    throw new UnsupportedNegationError(operator);
  }
  return inverse;
}

export function isNegatable(operator: Operator): boolean {
  return inverseOf(operator) !== undefined;
}
