import { z } from "zod";

import { ConfigurationError } from "../errors/index";
import {
  ENTITY_TYPE_BRAND,
  type EntityType,
  type RelationshipDef,
} from "./types";

// ============================================================
// Entity Factory Options
// ============================================================

/**
 * Options for defining an entity type.
 */
export type DefineEntityOptions<S extends z.ZodObject<z.ZodRawShape>> =
  Readonly<{
    /** Zod schema for entity attributes (defaults to empty object) */
    schema?: S;
    /** Relationship fields keyed by field name */
    relationships?: Readonly<Record<string, RelationshipDef>>;
    /** Optional description for documentation */
    description?: string;
  }>;

const EMPTY_SCHEMA = z.object({});
type EmptySchema = typeof EMPTY_SCHEMA;

// ============================================================
// Entity Factory
// ============================================================

function validateFieldNames(
  schema: z.ZodObject<z.ZodRawShape>,
  relationships: Readonly<Record<string, RelationshipDef>>,
  name: string,
): void {
  const attributes = new Set(Object.keys(schema.shape));
  const conflicts = Object.keys(relationships).filter((field) =>
    attributes.has(field),
  );
  if (conflicts.length > 0) {
    throw new ConfigurationError(
      `Entity "${name}" declares fields as both attribute and relationship: ${conflicts.join(", ")}`,
      { entity: name, conflicts },
      {
        suggestion: `Remove the conflicting names from either the schema or the relationships map.`,
      },
    );
  }
}

/**
 * Creates an entity type definition.
 *
 * @example
 * ```typescript
 * const Book = defineEntity("Book", {
 *   schema: z.object({
 *     title: z.string(),
 *     publishedYear: z.number().int(),
 *   }),
 *   relationships: {
 *     author: { target: "Author", cardinality: "toOne" },
 *     chapters: { target: "Chapter", cardinality: "toMany" },
 *   },
 * });
 * ```
 */
export function defineEntity<K extends string>(
  name: K,
): EntityType<K, EmptySchema>;

export function defineEntity<
  K extends string,
  S extends z.ZodObject<z.ZodRawShape>,
>(
  name: K,
  options: DefineEntityOptions<S> & { schema: S },
): EntityType<K, S>;

export function defineEntity<K extends string>(
  name: K,
  options: DefineEntityOptions<EmptySchema>,
): EntityType<K, EmptySchema>;

export function defineEntity(
  name: string,
  options: DefineEntityOptions<z.ZodObject<z.ZodRawShape>> = {},
): EntityType {
  const schema = options.schema ?? EMPTY_SCHEMA;
  const relationships = Object.freeze({ ...options.relationships });
  validateFieldNames(schema, relationships, name);

  return Object.freeze({
    [ENTITY_TYPE_BRAND]: true as const,
    name,
    schema,
    relationships,
    description: options.description,
  });
}

/**
 * Type guard for entity definitions.
 */
export function isEntityType(value: unknown): value is EntityType {
  return (
    typeof value === "object" &&
    value !== null &&
    ENTITY_TYPE_BRAND in value &&
    value[ENTITY_TYPE_BRAND] === true
  );
}
