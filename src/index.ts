// World
export { World, type WorldOptions } from "./world";
export { EntityBuilder } from "./entity_builder";

// Storage
export { Storage, type StorageOptions, type EntityRecord } from "./storage";
export { ComponentRegistry } from "./component_registry";

// Systems
export {
  as_system_id,
  type SystemID,
  type SystemFn,
  type SystemConfig,
  type SystemDescriptor,
} from "./system";

// Archetypes and columns
export {
  Archetype,
  align_and_migrate,
  as_archetype_id,
  type ArchetypeID,
} from "./archetype";
export { Column, ArrayColumn, NumericColumn, type AnyColumn } from "./column";

// Queries
export {
  Query,
  get_archetype_ids_for_types,
  assert_query_types,
  type QueryDefs,
} from "./query";

// Ref
export type { ComponentRef, ComponentRefs } from "./ref";

// Entities
export { as_entity_id, type EntityID } from "./entity";

// Components
export {
  as_component_id,
  type ComponentID,
  type ComponentDef,
  type AnyComponentDef,
  type ComponentValue,
  type ComponentValues,
  type ColumnKind,
} from "./component";

// Errors
export { AppError, ECSError, ECS_ERROR, is_ecs_error } from "./utils/error";

// Typed arrays
export type { TypedArrayTag } from "type_primitives";
