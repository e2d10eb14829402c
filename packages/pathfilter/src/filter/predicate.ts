/**
 * Filter predicates.
 *
 * A predicate is the leaf of a filter-expression tree: one traversal path,
 * one operator and an ordered value list. It derives the names a query
 * generator needs (alias, parameter names) from its path and structural
 * identity, and can be negated in place.
 */
import {
  type MetadataSource,
  type TypeIdentifier,
} from "../core/types";
import { PredicateUsageError } from "../errors/index";
import { type PathStep } from "../path/path-step";
import { TraversalPath } from "../path/traversal-path";
import { canonicalJson, structuralHash } from "../utils/hash";
import { simpleTypeName, typeAlias, uncapitalize } from "../utils/naming";
import { contextualizeOperator, stringForm } from "./contextualize";
import {
  type FilterExpression,
  type FilterExpressionVisitor,
} from "./expression";
import {
  isMatchingOperator,
  negateOperator,
  type Operator,
  operatorToken,
} from "./operator";
import { type BooleanTest, type RuntimeContext } from "./runtime-context";

const UNDERSCORE = "_";
const PERIOD = ".";

/**
 * A value bound to a generated parameter name.
 */
export type NamedParameter = Readonly<{
  name: string;
  value: unknown;
}>;

/**
 * Prefixes every occurrence of `special` in `value` with `escape`.
 */
export function escapeSpecialCharacter(
  value: string,
  special: string,
  escape: string,
): string {
  return value.replaceAll(special, `${escape}${special}`);
}

function formatValue(value: unknown): string {
  const text = stringForm(value);
  if (text !== undefined) return text;
  if (value === null || value === undefined || value instanceof Date) {
    return String(value);
  }
  return JSON.stringify(value) ?? String(value);
}

function isPathStep(value: TraversalPath | PathStep): value is PathStep {
  return !(value instanceof TraversalPath);
}

export class FilterPredicate implements FilterExpression {
  readonly path: TraversalPath;
  readonly values: readonly unknown[];
  #operator: Operator;

  /**
   * @param path - A traversal path, or a single step wrapped as a one-step path
   * @param operator - The operator applied to the terminal field
   * @param values - Ordered operand values; copied and frozen
   *
   * @example
   * ```typescript
   * const byAuthor = new FilterPredicate(
   *   dictionary.path(Book, "author.name"),
   *   "in",
   *   ["Ada", "Grace"],
   * );
   * ```
   */
  constructor(
    path: TraversalPath | PathStep,
    operator: Operator,
    values: readonly unknown[] = [],
  ) {
    this.path = isPathStep(path) ? TraversalPath.of(path) : path;
    this.#operator = operator;
    this.values = Object.freeze([...values]);
  }

  /**
   * True if any step of `path` is a to-many relationship according to
   * `metadata`.
   */
  static crossesToMany(metadata: MetadataSource, path: TraversalPath): boolean {
    return path
      .pathSteps()
      .some(
        (step) =>
          metadata.resolveCardinality(step.sourceType, step.fieldName) ===
          "toMany",
      );
  }

  get operator(): Operator {
    return this.#operator;
  }

  /**
   * Independent clone: new step list, new value list. Negating the clone
   * never affects this predicate.
   */
  copy(): FilterPredicate {
    return new FilterPredicate(this.path.copy(), this.#operator, this.values);
  }

  field(): string {
    return this.path.terminalField();
  }

  fieldPath(): string {
    return this.path.terminalFieldDottedPath();
  }

  entityType(): TypeIdentifier {
    return this.path.rootType();
  }

  crossesToMany(): boolean {
    return this.path.crossesToMany();
  }

  /**
   * Structural hash of path, operator and values as 8 hex characters.
   */
  hashCode(): string {
    return structuralHash({
      path: this.path.pathSteps().map((step) => [
        step.sourceType.name,
        step.fieldName,
        step.cardinality,
      ]),
      operator: this.#operator,
      values: this.values,
    });
  }

  /**
   * Base name for this predicate's query parameters, e.g.
   * "author_name_1a2b3c4d". Predicates sharing a field path get distinct
   * names unless they are structurally equal.
   */
  parameterNamePrefix(): string {
    return (
      this.fieldPath().replaceAll(PERIOD, UNDERSCORE) +
      UNDERSCORE +
      this.hashCode()
    );
  }

  /**
   * One parameter per value, named `${parameterNamePrefix()}_${index}`, in
   * value order.
   */
  namedParameters(): readonly NamedParameter[] {
    const baseName = this.parameterNamePrefix() + UNDERSCORE;
    return this.values.map((value, index) => ({
      name: `${baseName}${index}`,
      value,
    }));
  }

  /**
   * Alias of the collection the terminal field belongs to.
   *
   * A one-step path aliases the root type. A longer path aliases the edge
   * into the terminal field (the second-to-last step's type and field), so
   * predicates walking the same relationship share one join alias.
   */
  alias(): string {
    const previous = this.path.pathSteps().at(-2);
    if (previous === undefined) {
      return typeAlias(this.path.rootType());
    }
    return typeAlias(previous.sourceType) + UNDERSCORE + previous.fieldName;
  }

  isMatchingOperator(): boolean {
    return isMatchingOperator(this.#operator);
  }

  /**
   * The first value's string form with every `special` prefixed by `escape`.
   *
   * @throws PredicateUsageError when there is no value or it has no string form
   */
  escapedStringValue(special: string, escape: string): string {
    if (this.values.length === 0) {
      throw new PredicateUsageError(
        `Predicate on "${this.fieldPath()}" has no value to escape`,
        { fieldPath: this.fieldPath(), operator: this.#operator },
      );
    }
    const text = stringForm(this.values[0]);
    if (text === undefined) {
      throw new PredicateUsageError(
        `Predicate on "${this.fieldPath()}" has a value with no string form`,
        { fieldPath: this.fieldPath(), operator: this.#operator },
      );
    }
    return escapeSpecialCharacter(text, special, escape);
  }

  /**
   * Replaces the operator with its inverse.
   *
   * @throws UnsupportedNegationError when the operator has no inverse; the
   *   operator is left unchanged
   */
  negate(): void {
    this.#operator = negateOperator(this.#operator);
  }

  /**
   * Executable test of this predicate against entities in `context`.
   *
   * @throws OperatorArityError when the value count violates the operator's arity
   */
  apply(context: RuntimeContext): BooleanTest {
    return contextualizeOperator(
      this.#operator,
      this.fieldPath(),
      this.values,
      context,
    );
  }

  accept<T>(visitor: FilterExpressionVisitor<T>): T {
    return visitor.visitPredicate(this);
  }

  equals(other: FilterPredicate): boolean {
    return (
      this.#operator === other.operator &&
      this.path.equals(other.path) &&
      canonicalJson(this.values) === canonicalJson(other.values)
    );
  }

  /**
   * "book.author.name in [Ada, Grace]"
   */
  toString(): string {
    const root = uncapitalize(simpleTypeName(this.path.rootType()));
    const fields = this.path
      .pathSteps()
      .map((step) => PERIOD + step.fieldName)
      .join("");
    const values = this.values.map(formatValue).join(", ");
    return `${root}${fields} ${operatorToken(this.#operator)} [${values}]`;
  }
}
