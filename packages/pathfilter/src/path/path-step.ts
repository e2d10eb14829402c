import { type Cardinality, type TypeIdentifier } from "../core/types";

/**
 * One hop of a traversal path: a field on a source type.
 *
 * The cardinality is resolved by entity metadata when the step is built
 * and is read-only afterwards.
 */
export type PathStep = Readonly<{
  sourceType: TypeIdentifier;
  fieldName: string;
  cardinality: Cardinality;
}>;

/**
 * Creates a path step.
 *
 * @example
 * ```typescript
 * pathStep(Book, "author", "toOne");
 * pathStep(Author, "name");
 * ```
 */
export function pathStep(
  sourceType: TypeIdentifier,
  fieldName: string,
  cardinality: Cardinality = "none",
): PathStep {
  return Object.freeze({ sourceType, fieldName, cardinality });
}

export function stepsEqual(left: PathStep, right: PathStep): boolean {
  return (
    left.sourceType.name === right.sourceType.name &&
    left.fieldName === right.fieldName &&
    left.cardinality === right.cardinality
  );
}
