/**
 * Entity dictionary.
 *
 * Holds entity definitions and answers the metadata questions paths and
 * predicates ask: which fields exist, which are relationships, and with
 * what cardinality.
 */
import {
  type Cardinality,
  type EntityType,
  type MetadataSource,
  type RelationshipDef,
  type TypeIdentifier,
} from "../core/types";
import {
  ConfigurationError,
  EntityNotFoundError,
  InvalidPathError,
  UnknownFieldError,
} from "../errors/index";
import { type PathStep, pathStep } from "../path/path-step";
import { TraversalPath } from "../path/traversal-path";

export class EntityDictionary implements MetadataSource {
  readonly entities: ReadonlyMap<string, EntityType>;

  constructor(entities: ReadonlyMap<string, EntityType>) {
    this.entities = entities;
  }

  hasEntity(name: string): boolean {
    return this.entities.has(name);
  }

  /**
   * @throws EntityNotFoundError when no entity has this name
   */
  getEntity(name: string): EntityType {
    const entity = this.entities.get(name);
    if (entity === undefined) {
      throw new EntityNotFoundError(name);
    }
    return entity;
  }

  /**
   * `"none"` for attributes, the declared cardinality for relationships.
   *
   * @throws UnknownFieldError when the field is neither
   */
  resolveCardinality(type: TypeIdentifier, fieldName: string): Cardinality {
    const entity = this.getEntity(type.name);
    const relationship = this.#relationship(entity, fieldName);
    if (relationship !== undefined) return relationship.cardinality;
    if (Object.hasOwn(entity.schema.shape, fieldName)) return "none";
    throw new UnknownFieldError(entity.name, fieldName);
  }

  /**
   * Entity a relationship field points at, or undefined for attributes.
   */
  relationshipTarget(
    type: TypeIdentifier,
    fieldName: string,
  ): EntityType | undefined {
    const relationship = this.#relationship(
      this.getEntity(type.name),
      fieldName,
    );
    return relationship === undefined ?
        undefined
      : this.getEntity(relationship.target);
  }

  /**
   * Builds a path step with its cardinality resolved from metadata.
   */
  step(type: TypeIdentifier, fieldName: string): PathStep {
    return pathStep(type, fieldName, this.resolveCardinality(type, fieldName));
  }

  /**
   * Resolves a dotted field path from a root entity, following relationship
   * targets hop by hop.
   *
   * @example
   * ```typescript
   * dictionary.path(Book, "author.address.city");
   * ```
   */
  path(root: TypeIdentifier, dottedPath: string): TraversalPath {
    if (dottedPath === "") {
      throw new InvalidPathError("A traversal path needs at least one step", {
        root: root.name,
      });
    }

    const steps: PathStep[] = [];
    let current: TypeIdentifier | undefined = root;
    for (const fieldName of dottedPath.split(".")) {
      if (current === undefined) {
        const previous = steps.at(-1);
        throw new InvalidPathError(
          `Cannot traverse past attribute "${previous?.fieldName ?? ""}" in "${dottedPath}"`,
          { root: root.name, path: dottedPath },
        );
      }
      steps.push(this.step(current, fieldName));
      current = this.relationshipTarget(current, fieldName);
    }
    return new TraversalPath(steps);
  }

  #relationship(
    entity: EntityType,
    fieldName: string,
  ): RelationshipDef | undefined {
    return Object.hasOwn(entity.relationships, fieldName) ?
        entity.relationships[fieldName]
      : undefined;
  }
}

/**
 * Creates a dictionary from entity definitions.
 *
 * @throws ConfigurationError on duplicate names or unknown relationship targets
 *
 * @example
 * ```typescript
 * const dictionary = createEntityDictionary([Author, Book, Chapter]);
 * dictionary.resolveCardinality(Book, "chapters"); // "toMany"
 * ```
 */
export function createEntityDictionary(
  entities: readonly EntityType[],
): EntityDictionary {
  const byName = new Map<string, EntityType>();
  for (const entity of entities) {
    if (byName.has(entity.name)) {
      throw new ConfigurationError(
        `Entity "${entity.name}" is defined more than once`,
        { entity: entity.name },
      );
    }
    byName.set(entity.name, entity);
  }

  for (const entity of entities) {
    for (const [field, relationship] of Object.entries(entity.relationships)) {
      if (!byName.has(relationship.target)) {
        throw new ConfigurationError(
          `Relationship "${entity.name}.${field}" targets unknown entity "${relationship.target}"`,
          { entity: entity.name, field, target: relationship.target },
          {
            suggestion: `Pass "${relationship.target}" to createEntityDictionary() alongside "${entity.name}".`,
          },
        );
      }
    }
  }

  return new EntityDictionary(byName);
}
