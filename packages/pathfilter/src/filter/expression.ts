/**
 * Filter expression trees.
 *
 * Predicates are the leaves; AND, OR and NOT compose them. Consumers
 * observe a tree only through the visitor contract.
 */
import { type FilterPredicate } from "./predicate";

export type FilterExpressionVisitor<T> = Readonly<{
  visitPredicate: (predicate: FilterPredicate) => T;
  visitAnd: (expression: AndFilterExpression) => T;
  visitOr: (expression: OrFilterExpression) => T;
  visitNot: (expression: NotFilterExpression) => T;
}>;

export type FilterExpression = Readonly<{
  accept: <T>(visitor: FilterExpressionVisitor<T>) => T;
}>;

export class AndFilterExpression implements FilterExpression {
  constructor(
    readonly left: FilterExpression,
    readonly right: FilterExpression,
  ) {}

  accept<T>(visitor: FilterExpressionVisitor<T>): T {
    return visitor.visitAnd(this);
  }
}

export class OrFilterExpression implements FilterExpression {
  constructor(
    readonly left: FilterExpression,
    readonly right: FilterExpression,
  ) {}

  accept<T>(visitor: FilterExpressionVisitor<T>): T {
    return visitor.visitOr(this);
  }
}

export class NotFilterExpression implements FilterExpression {
  constructor(readonly negated: FilterExpression) {}

  accept<T>(visitor: FilterExpressionVisitor<T>): T {
    return visitor.visitNot(this);
  }
}

/**
 * Left-folds operands into nested AND nodes: and(a, b, c) is (a AND b) AND c.
 */
export function and(
  first: FilterExpression,
  second: FilterExpression,
  ...rest: readonly FilterExpression[]
): FilterExpression {
  return rest.reduce<FilterExpression>(
    (combined, next) => new AndFilterExpression(combined, next),
    new AndFilterExpression(first, second),
  );
}

/**
 * Left-folds operands into nested OR nodes.
 */
export function or(
  first: FilterExpression,
  second: FilterExpression,
  ...rest: readonly FilterExpression[]
): FilterExpression {
  return rest.reduce<FilterExpression>(
    (combined, next) => new OrFilterExpression(combined, next),
    new OrFilterExpression(first, second),
  );
}

export function not(expression: FilterExpression): FilterExpression {
  return new NotFilterExpression(expression);
}
