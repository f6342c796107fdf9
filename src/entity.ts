/***
 * Entity — Opaque handle to a logical game object.
 *
 * An EntityID is a plain non-negative integer. Ids are handed out by the
 * World in increasing order starting at FIRST_ENTITY_ID and are never
 * reused, so there is no generation counter: once an entity is removed
 * its id simply stops resolving to a record in the Storage.
 *
 * Archetypes keep their row → entity mapping in a Uint32Array, which
 * caps ids at MAX_ENTITY_ID.
 *
 ***/

import { type Brand, validate_and_cast, is_u32 } from "type_primitives";

export type EntityID = Brand<number, "entity_id">;

export const as_entity_id = (value: number) =>
  validate_and_cast<number, EntityID>(
    value,
    is_u32,
    "EntityID must be an integer in [0, 2^32 - 1]",
  );
