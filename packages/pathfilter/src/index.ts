/**
 * pathfilter: typed filter predicates over entity traversal paths
 *
 * @example
 * ```typescript
 * import * as pf from "pathfilter";
 * import { z } from "zod";
 *
 * const Author = pf.defineEntity("Author", {
 *   schema: z.object({ name: z.string() }),
 * });
 *
 * const Book = pf.defineEntity("Book", {
 *   schema: z.object({ title: z.string(), year: z.number().int() }),
 *   relationships: {
 *     author: { target: "Author", cardinality: "toOne" },
 *   },
 * });
 *
 * const dictionary = pf.createEntityDictionary([Author, Book]);
 *
 * const filter = pf.and(
 *   new pf.FilterPredicate(dictionary.path(Book, "author.name"), "in", ["Ada"]),
 *   new pf.FilterPredicate(dictionary.path(Book, "year"), "ge", [1950]),
 * );
 *
 * const { sql, parameters } = pf.translateFilter(filter);
 * const matches = books.filter(
 *   pf.createInMemoryFilter(filter, pf.createObjectGraphContext()),
 * );
 * ```
 */

// ============================================================
// Entities
// ============================================================

export {
  type Cardinality,
  defineEntity,
  type DefineEntityOptions,
  type EntityAttributes,
  type EntityType,
  isEntityType,
  type MetadataSource,
  type RelationshipCardinality,
  type RelationshipDef,
  type TypeIdentifier,
} from "./core";

export { createEntityDictionary, EntityDictionary } from "./metadata";

// ============================================================
// Paths
// ============================================================

export { type PathStep, pathStep, stepsEqual, TraversalPath } from "./path";

// ============================================================
// Filters
// ============================================================

export {
  acceptsValueCount,
  and,
  AndFilterExpression,
  type Arity,
  assertArity,
  type BooleanTest,
  compareValues,
  contextualizeOperator,
  createInMemoryFilter,
  createObjectGraphContext,
  describeArity,
  escapeSpecialCharacter,
  expressionCrossesToMany,
  extractPredicates,
  type FilterExpression,
  type FilterExpressionVisitor,
  FilterPredicate,
  isMatchingOperator,
  isNegatable,
  isOperator,
  type MatchingOperator,
  type NamedParameter,
  negateOperator,
  normalizeFilterExpression,
  type NormalizationOptions,
  not,
  NotFilterExpression,
  type Operator,
  operatorArity,
  OPERATORS,
  operatorToken,
  or,
  OrFilterExpression,
  type RuntimeContext,
  valuesEqual,
} from "./filter";

// ============================================================
// SQL Translation
// ============================================================

export {
  type PredicateTranslationContext,
  type TranslatedFilter,
  translateFilter,
  type TranslateFilterOptions,
  type TranslationErrorContext,
  type TranslatorHooks,
} from "./translate";

// ============================================================
// Errors
// ============================================================

export type {
  ErrorCategory,
  PathFilterErrorOptions,
  ValidationIssue,
} from "./errors";
export {
  ConfigurationError,
  EntityNotFoundError,
  getErrorSuggestion,
  InvalidPathError,
  isPathFilterError,
  isSystemError,
  isUserRecoverable,
  OperatorArityError,
  PathFilterError,
  PredicateUsageError,
  UnknownFieldError,
  UnsupportedNegationError,
  UnsupportedPredicateError,
  ValidationError,
} from "./errors";
