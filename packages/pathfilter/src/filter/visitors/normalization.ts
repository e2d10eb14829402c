/**
 * Negation normalization.
 *
 * Pushes every NOT down to the leaves with De Morgan's laws and folds it
 * into the predicates' operators:
 *
 *   NOT (a AND b)  ->  NOT a OR NOT b
 *   NOT (a OR b)   ->  NOT a AND NOT b
 *   NOT NOT a      ->  a
 *   NOT (x >= 1)   ->  x < 1
 *
 * Predicates are copied before negation; the input tree is never mutated.
 *
 * In-memory results are unchanged when every negated leaf uses `in`,
 * `notIn`, `isNull`, `notNull`, `isTrue` or `isFalse`. Ordering leaves
 * keep their result only on single, present values comparable with the
 * operand: over a missing field `NOT (x >= 1)` holds while `x < 1` does
 * not, and over a to-many field `[0, 5]` the reverse is true.
 */
import { z } from "zod";

import { UnsupportedNegationError } from "../../errors/index";
import { validateOptions } from "../../errors/validation";
import {
  AndFilterExpression,
  type FilterExpression,
  type FilterExpressionVisitor,
  NotFilterExpression,
  OrFilterExpression,
} from "../expression";
import { type FilterPredicate } from "../predicate";

const normalizationOptionsSchema = z.object({
  /**
   * What to do with a NOT over a predicate whose operator has no inverse:
   * `"throw"` propagates UnsupportedNegationError, `"retain"` keeps the NOT node.
   */
  unsupportedNegation: z.enum(["throw", "retain"]).default("throw"),
});

export type NormalizationOptions = z.input<typeof normalizationOptionsSchema>;

type NormalizationConfig = z.output<typeof normalizationOptionsSchema>;

function negatePredicate(
  predicate: FilterPredicate,
  config: NormalizationConfig,
): FilterExpression {
  const negated = predicate.copy();
  try {
    negated.negate();
  } catch (error) {
    if (
      error instanceof UnsupportedNegationError &&
      config.unsupportedNegation === "retain"
    ) {
      return new NotFilterExpression(predicate.copy());
    }
    throw error;
  }
  return negated;
}

function createNegatingVisitor(
  config: NormalizationConfig,
  normalizer: FilterExpressionVisitor<FilterExpression>,
): FilterExpressionVisitor<FilterExpression> {
  const negating: FilterExpressionVisitor<FilterExpression> = {
    visitPredicate: (predicate) => negatePredicate(predicate, config),
    visitAnd: (expression) =>
      new OrFilterExpression(
        expression.left.accept(negating),
        expression.right.accept(negating),
      ),
    visitOr: (expression) =>
      new AndFilterExpression(
        expression.left.accept(negating),
        expression.right.accept(negating),
      ),
    visitNot: (expression) => expression.negated.accept(normalizer),
  };
  return negating;
}

function createNormalizingVisitor(
  config: NormalizationConfig,
): FilterExpressionVisitor<FilterExpression> {
  const normalizer: FilterExpressionVisitor<FilterExpression> = {
    visitPredicate: (predicate) => predicate.copy(),
    visitAnd: (expression) =>
      new AndFilterExpression(
        expression.left.accept(normalizer),
        expression.right.accept(normalizer),
      ),
    visitOr: (expression) =>
      new OrFilterExpression(
        expression.left.accept(normalizer),
        expression.right.accept(normalizer),
      ),
    visitNot: (expression) => expression.negated.accept(negating),
  };
  const negating = createNegatingVisitor(config, normalizer);
  return normalizer;
}

/**
 * Returns an equivalent tree with no NOT nodes above a predicate, except
 * for retained unsupported negations.
 *
 * @throws UnsupportedNegationError when a NOT reaches a predicate whose
 *   operator has no inverse and `unsupportedNegation` is `"throw"`
 * @throws ValidationError when options are invalid
 *
 * @example
 * ```typescript
 * const normalized = normalizeFilterExpression(
 *   not(and(adults, activeAuthors)),
 *   { unsupportedNegation: "retain" },
 * );
 * ```
 */
export function normalizeFilterExpression(
  expression: FilterExpression,
  options: NormalizationOptions = {},
): FilterExpression {
  const config = validateOptions(
    normalizationOptionsSchema,
    options,
    "normalizeFilterExpression",
  );
  return expression.accept(createNormalizingVisitor(config));
}
