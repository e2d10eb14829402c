/**
 * Shared Arbitrary Generators for Property-Based Tests
 *
 * Reusable fast-check arbitraries for operators, paths and predicates.
 */
import fc from "fast-check";

import { type Operator, OPERATORS } from "../../src/filter";
import { pathStep, TraversalPath } from "../../src/path";

// ============================================================
// Operator Arbitraries
// ============================================================

export const operatorArb: fc.Arbitrary<Operator> = fc.constantFrom(
  ...OPERATORS,
);

/**
 * Operators with an inverse in the negation table.
 */
export const negatableOperatorArb: fc.Arbitrary<Operator> = fc.constantFrom(
  "ge",
  "lt",
  "gt",
  "le",
  "in",
  "notIn",
  "isTrue",
  "isFalse",
  "isNull",
  "notNull",
);

/**
 * Equality and the six matching operators.
 */
export const nonNegatableOperatorArb: fc.Arbitrary<Operator> = fc.constantFrom(
  "eq",
  "prefix",
  "prefixInsensitive",
  "postfix",
  "postfixInsensitive",
  "infix",
  "infixInsensitive",
);

// ============================================================
// Path Arbitraries
// ============================================================

const identifierArb = fc.stringMatching(/^[a-z][a-zA-Z0-9]{0,8}$/);

const typeNameArb = fc.stringMatching(/^[A-Z][a-zA-Z0-9]{0,8}$/);

const cardinalityArb = fc.constantFrom("none", "toOne", "toMany");

/**
 * Paths of one to four steps.
 */
export const traversalPathArb: fc.Arbitrary<TraversalPath> = fc
  .array(fc.tuple(typeNameArb, identifierArb, cardinalityArb), {
    minLength: 1,
    maxLength: 4,
  })
  .map(
    (steps) =>
      new TraversalPath(
        steps.map(([type, field, cardinality]) =>
          pathStep({ name: type }, field, cardinality),
        ),
      ),
  );

// ============================================================
// Value Arbitraries
// ============================================================

export const scalarValueArb: fc.Arbitrary<string | number | boolean> = fc.oneof(
  fc.string({ maxLength: 12 }),
  fc.integer(),
  fc.boolean(),
);
