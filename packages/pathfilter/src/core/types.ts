import { type z } from "zod";

// ============================================================
// Brand Keys for Nominal Typing
// ============================================================

/** Brand key for EntityType */
export const ENTITY_TYPE_BRAND = "__entityType" as const;

// ============================================================
// Type Identifiers
// ============================================================

/**
 * The minimal identity a path step needs from a type: its name.
 *
 * Names may be namespaced with dots ("library.Book"); the segment after
 * the last dot is the simple name.
 */
export type TypeIdentifier = Readonly<{
  name: string;
}>;

/**
 * Relationship multiplicity of a path step.
 *
 * - `"none"`: the field is a plain attribute
 * - `"toOne"`: the field references a single entity
 * - `"toMany"`: the field references a collection of entities
 */
export type Cardinality = "none" | "toOne" | "toMany";

/**
 * Cardinalities a declared relationship may have.
 */
export type RelationshipCardinality = Exclude<Cardinality, "none">;

/**
 * A relationship from one entity to another, declared by target name so
 * that entities may reference each other in cycles.
 */
export type RelationshipDef = Readonly<{
  target: string;
  cardinality: RelationshipCardinality;
}>;

// ============================================================
// Entity Type
// ============================================================

/**
 * An entity type definition.
 *
 * Created via `defineEntity()`. Attributes come from the Zod schema,
 * relationships from the `relationships` map.
 */
export type EntityType<
  K extends string = string,
  S extends z.ZodObject<z.ZodRawShape> = z.ZodObject<z.ZodRawShape>,
> = Readonly<{
  [ENTITY_TYPE_BRAND]: true;
  name: K;
  schema: S;
  relationships: Readonly<Record<string, RelationshipDef>>;
  description: string | undefined;
}>;

/**
 * Infer the attribute type from an EntityType.
 */
export type EntityAttributes<E extends EntityType> = z.infer<E["schema"]>;

/**
 * Capability to look up the cardinality of a field on a type.
 */
export type MetadataSource = Readonly<{
  resolveCardinality: (type: TypeIdentifier, fieldName: string) => Cardinality;
}>;
