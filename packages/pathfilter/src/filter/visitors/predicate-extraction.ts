import { type MetadataSource } from "../../core/types";
import {
  type FilterExpression,
  type FilterExpressionVisitor,
} from "../expression";
import { FilterPredicate } from "../predicate";

const predicateExtractor: FilterExpressionVisitor<readonly FilterPredicate[]> =
  {
    visitPredicate: (predicate) => [predicate],
    visitAnd: (expression) => [
      ...expression.left.accept(predicateExtractor),
      ...expression.right.accept(predicateExtractor),
    ],
    visitOr: (expression) => [
      ...expression.left.accept(predicateExtractor),
      ...expression.right.accept(predicateExtractor),
    ],
    visitNot: (expression) => expression.negated.accept(predicateExtractor),
  };

/**
 * Leaf predicates of a tree, left to right.
 */
export function extractPredicates(
  expression: FilterExpression,
): readonly FilterPredicate[] {
  return expression.accept(predicateExtractor);
}

/**
 * True if any predicate in the tree walks a to-many relationship, in which
 * case the query must be planned so unrelated rows are not restricted.
 */
export function expressionCrossesToMany(
  metadata: MetadataSource,
  expression: FilterExpression,
): boolean {
  return extractPredicates(expression).some((predicate) =>
    FilterPredicate.crossesToMany(metadata, predicate.path),
  );
}
