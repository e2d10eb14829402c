/**
 * Traversal paths.
 *
 * A traversal path walks from a root type across relationships to the
 * terminal field a predicate filters on. Step i's field, when it is a
 * relationship, targets the type step i + 1 is anchored on.
 */
import { type TypeIdentifier } from "../core/types";
import { InvalidPathError } from "../errors/index";
import { simpleTypeName } from "../utils/naming";
import { type PathStep, stepsEqual } from "./path-step";

const PERIOD = ".";

export class TraversalPath {
  readonly #steps: readonly PathStep[];
  readonly #first: PathStep;
  readonly #last: PathStep;

  /**
   * @throws InvalidPathError when `steps` is empty
   */
  constructor(steps: readonly PathStep[]) {
    const first = steps.at(0);
    const last = steps.at(-1);
    if (first === undefined || last === undefined) {
      throw new InvalidPathError("A traversal path needs at least one step");
    }
    this.#steps = Object.freeze([...steps]);
    this.#first = first;
    this.#last = last;
  }

  /**
   * Wraps a single step as a one-step path.
   */
  static of(step: PathStep): TraversalPath {
    return new TraversalPath([step]);
  }

  pathSteps(): readonly PathStep[] {
    return this.#steps;
  }

  terminalStep(): PathStep {
    return this.#last;
  }

  terminalField(): string {
    return this.#last.fieldName;
  }

  /**
   * Field names joined by ".", e.g. "author.address.city".
   */
  terminalFieldDottedPath(): string {
    return this.#steps.map((step) => step.fieldName).join(PERIOD);
  }

  rootType(): TypeIdentifier {
    return this.#first.sourceType;
  }

  crossesToMany(): boolean {
    return this.#steps.some((step) => step.cardinality === "toMany");
  }

  /**
   * Returns an independent path over a new step list.
   */
  copy(): TraversalPath {
    return new TraversalPath([...this.#steps]);
  }

  equals(other: TraversalPath): boolean {
    const otherSteps = other.pathSteps();
    if (otherSteps.length !== this.#steps.length) return false;
    return this.#steps.every((step, index) => {
      const otherStep = otherSteps[index];
      return otherStep !== undefined && stepsEqual(step, otherStep);
    });
  }

  /**
   * "Book.author.name": root simple name followed by each field.
   */
  toString(): string {
    return [simpleTypeName(this.rootType()), this.terminalFieldDottedPath()].join(
      PERIOD,
    );
  }
}
