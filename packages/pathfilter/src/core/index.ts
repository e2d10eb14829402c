// Entity factory
export {
  defineEntity,
  type DefineEntityOptions,
  isEntityType,
} from "./entity";

// Types
export {
  type Cardinality,
  ENTITY_TYPE_BRAND,
  type EntityAttributes,
  type EntityType,
  type MetadataSource,
  type RelationshipCardinality,
  type RelationshipDef,
  type TypeIdentifier,
} from "./types";
