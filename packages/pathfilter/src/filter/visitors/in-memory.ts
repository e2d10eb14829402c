import {
  type FilterExpression,
  type FilterExpressionVisitor,
} from "../expression";
import { type BooleanTest, type RuntimeContext } from "../runtime-context";

/**
 * Compiles a filter tree into one test evaluated against materialized
 * entities. Every predicate is contextualized up front, so arity errors
 * surface here rather than on the first entity.
 *
 * @throws OperatorArityError from any predicate in the tree
 *
 * @example
 * ```typescript
 * const test = createInMemoryFilter(expression, createObjectGraphContext());
 * const matches = books.filter(test);
 * ```
 */
export function createInMemoryFilter(
  expression: FilterExpression,
  context: RuntimeContext,
): BooleanTest {
  const compiler: FilterExpressionVisitor<BooleanTest> = {
    visitPredicate: (predicate) => predicate.apply(context),
    visitAnd: (node) => {
      const left = node.left.accept(compiler);
      const right = node.right.accept(compiler);
      return (entity) => left(entity) && right(entity);
    },
    visitOr: (node) => {
      const left = node.left.accept(compiler);
      const right = node.right.accept(compiler);
      return (entity) => left(entity) || right(entity);
    },
    visitNot: (node) => {
      const negated = node.negated.accept(compiler);
      return (entity) => !negated(entity);
    },
  };
  return expression.accept(compiler);
}
