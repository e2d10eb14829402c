// Operators
export {
  acceptsValueCount,
  type Arity,
  describeArity,
  isMatchingOperator,
  isNegatable,
  isOperator,
  type MatchingOperator,
  negateOperator,
  type Operator,
  operatorArity,
  OPERATORS,
  operatorToken,
} from "./operator";

// Runtime evaluation
export {
  assertArity,
  compareValues,
  contextualizeOperator,
  valuesEqual,
} from "./contextualize";
export {
  type BooleanTest,
  createObjectGraphContext,
  type RuntimeContext,
} from "./runtime-context";

// Predicates and expression trees
export {
  escapeSpecialCharacter,
  FilterPredicate,
  type NamedParameter,
} from "./predicate";
export {
  and,
  AndFilterExpression,
  type FilterExpression,
  type FilterExpressionVisitor,
  not,
  NotFilterExpression,
  or,
  OrFilterExpression,
} from "./expression";

// Visitors
export { createInMemoryFilter } from "./visitors/in-memory";
export {
  normalizeFilterExpression,
  type NormalizationOptions,
} from "./visitors/normalization";
export {
  expressionCrossesToMany,
  extractPredicates,
} from "./visitors/predicate-extraction";
