/***
 * Storage — Archetype table, type index and entity index.
 *
 * Owns every archetype (by ArchetypeID), a reverse index from component
 * type to the archetypes containing it, and a record per entity pointing
 * at its (archetype, row). All structural changes go through here:
 *
 *   add_component     find-or-derive the archetype for types ∪ {T},
 *                     migrate the entity's row, push the new value
 *   remove_component  find-or-derive the archetype for types ∖ {T},
 *                     migrate the entity's row
 *   remove_entity     swap-remove the entity's row, or drop the whole
 *                     archetype when the entity was its only member
 *                     (every archetype, when it was the last entity)
 *
 * Archetypes are looked up by exact type set through the type index
 * (anchored on one type of the wanted set), never through cached graph
 * edges. Detaching a component never deletes the archetype it leaves
 * behind, even when that archetype is now empty; only remove_entity
 * cleans up, so under detach-heavy workloads archetype_count only grows.
 *
 * Every swap-remove moves some other entity into the vacated row; its
 * record is fixed up immediately after (fix_swapped_row).
 *
 * Single-writer: no operation here may interleave with iteration of a
 * Query over the same Storage.
 *
 ***/

import { is_u32, type TypedArrayTag } from "type_primitives";
import {
  Archetype,
  align_and_migrate,
  as_archetype_id,
  type ArchetypeID,
} from "./archetype";
import type { ComponentDef, ComponentID } from "./component";
import { ComponentRegistry } from "./component_registry";
import type { EntityID } from "./entity";
import { Query, type QueryDefs } from "./query";
import { ECS_ERROR, ECSError } from "./utils/error";
import { DEFAULT_COLUMN_CAPACITY, NO_SWAP } from "./utils/constants";
import { sorted_with, sorted_without } from "./utils/arrays";

export interface StorageOptions {
  /** Initial buffer size of numeric columns and archetype row lists. */
  initial_capacity?: number;
}

export interface EntityRecord {
  archetype_id: ArchetypeID;
  row: number;
}

export class Storage {
  readonly components: ComponentRegistry;
  private readonly initial_capacity: number;

  // --- Archetype management ---
  private readonly archetype_table: Map<ArchetypeID, Archetype> = new Map();
  // Type index: ComponentID → ids of every archetype holding that type.
  // Sets keep insertion order, so candidate scans are stable.
  private readonly component_index: Map<ComponentID, Set<ArchetypeID>> =
    new Map();
  private next_archetype_id = 0;
  // The zero-component archetype has no type to be indexed under
  private empty_archetype_id: ArchetypeID | null = null;

  // --- Entity management ---
  private readonly entity_index: Map<EntityID, EntityRecord> = new Map();

  constructor(options?: StorageOptions) {
    this.initial_capacity = options?.initial_capacity ?? DEFAULT_COLUMN_CAPACITY;
    this.components = new ComponentRegistry(this.initial_capacity);
  }

  //=========================================================
  // Component registration
  //=========================================================

  public register_component<T>(name?: string): ComponentDef<T> {
    return this.components.register<T>(name);
  }

  public register_numeric(
    tag: TypedArrayTag,
    name?: string,
  ): ComponentDef<number> {
    return this.components.register_numeric(tag, name);
  }

  //=========================================================
  // Structural changes
  //=========================================================

  /**
   * Attach `value` to `entity`. If the entity already has a `def` value
   * this is a no-op: the first value wins (use set_component to overwrite).
   */
  public add_component<T>(
    entity: EntityID,
    def: ComponentDef<T>,
    value: T,
  ): void {
    if (__DEV__ && !is_u32(entity)) {
      throw new ECSError(
        ECS_ERROR.INVALID_ENTITY_ID,
        `Entity id ${entity} is not an integer in [0, 2^32 - 1]`,
        { entity },
      );
    }

    const record = this.entity_index.get(entity);
    if (record === undefined) {
      this.insert_entity(entity, def, value);
      return;
    }

    const source = this.arch_get(record.archetype_id);
    if (source.has_component(def)) return;

    const target =
      this.find_archetype(sorted_with(source.types, def), def) ??
      this.register_archetype(
        Archetype.from_add(
          source,
          this.alloc_archetype_id(),
          this.components.create_column(def),
        ),
      );

    this.move_entity(entity, record, source, target);
    target.push(def, value);

    if (__DEV__) this.check_aligned(target);
  }

  /** Detach `def` from `entity`. No-op if the entity does not have it. */
  public remove_component(entity: EntityID, def: ComponentID): void {
    const record = this.entity_index.get(entity);
    if (record === undefined) return;

    const source = this.arch_get(record.archetype_id);
    if (!source.has_component(def)) return;

    const remaining = sorted_without(source.types, def);
    const target =
      this.find_archetype(remaining, remaining[0]) ??
      this.register_archetype(
        Archetype.from_remove(source, this.alloc_archetype_id(), def),
      );

    this.move_entity(entity, record, source, target);

    if (__DEV__) this.check_aligned(target);
  }

  /**
   * Remove `entity` and all of its components. Removing the only entity
   * of an archetype removes the archetype and its type-index entries;
   * removing the last entity of the whole storage drops every archetype.
   * No-op for an unknown entity.
   */
  public remove_entity(entity: EntityID): void {
    const record = this.entity_index.get(entity);
    if (record === undefined) return;

    const archetype = this.arch_get(record.archetype_id);
    this.entity_index.delete(entity);

    if (this.entity_index.size === 0) {
      this.clear_archetypes();
      return;
    }

    if (archetype.entity_count === 1) {
      this.remove_archetype(archetype.id);
      return;
    }

    const swapped = archetype.release_row(record.row);
    this.fix_swapped_row(archetype, record.row, swapped);
  }

  /**
   * Overwrite the value of a component the entity already has.
   * Returns false (and changes nothing) when it does not have one.
   */
  public set_component<T>(
    entity: EntityID,
    def: ComponentDef<T>,
    value: T,
  ): boolean {
    const record = this.entity_index.get(entity);
    if (record === undefined) return false;
    const archetype = this.arch_get(record.archetype_id);
    if (!archetype.has_component(def)) return false;
    archetype.get_column(def).set(record.row, value);
    return true;
  }

  //=========================================================
  // Entity lookup
  //=========================================================

  public has_entity(entity: EntityID): boolean {
    return this.entity_index.has(entity);
  }

  public has_component(entity: EntityID, def: ComponentID): boolean {
    const record = this.entity_index.get(entity);
    if (record === undefined) return false;
    return this.arch_get(record.archetype_id).has_component(def);
  }

  public get_component<T>(
    entity: EntityID,
    def: ComponentDef<T>,
  ): T | undefined {
    const record = this.entity_index.get(entity);
    if (record === undefined) return undefined;
    const archetype = this.arch_get(record.archetype_id);
    if (!archetype.has_component(def)) return undefined;
    return archetype.get_column(def).get(record.row);
  }

  public get_entity_record(
    entity: EntityID,
  ): Readonly<EntityRecord> | undefined {
    return this.entity_index.get(entity);
  }

  /** Archetype currently holding `entity`, if any. */
  public get_entity_archetype(entity: EntityID): Archetype | undefined {
    const record = this.entity_index.get(entity);
    return record === undefined ? undefined : this.arch_get(record.archetype_id);
  }

  public get entity_count(): number {
    return this.entity_index.size;
  }

  public entities(): IterableIterator<EntityID> {
    return this.entity_index.keys();
  }

  //=========================================================
  // Archetype lookup
  //=========================================================

  public get_archetype(id: ArchetypeID): Archetype | undefined {
    return this.archetype_table.get(id);
  }

  /** All live archetypes, in ascending id order. */
  public archetypes(): IterableIterator<Archetype> {
    return this.archetype_table.values();
  }

  public get archetype_count(): number {
    return this.archetype_table.size;
  }

  /** Ids of the archetypes holding `type`; undefined if none ever did or all were removed. */
  public get_archetype_ids_for_component(
    type: ComponentID,
  ): ReadonlySet<ArchetypeID> | undefined {
    return this.component_index.get(type);
  }

  /** Number of component types with at least one archetype in the index. */
  public get type_index_size(): number {
    return this.component_index.size;
  }

  //=========================================================
  // Queries
  //=========================================================

  /**
   * Lazy view over every entity holding all of `defs`. Tuples come out in
   * the order the types are requested. Duplicate types throw.
   */
  public query<Defs extends QueryDefs>(...defs: Defs): Query<Defs> {
    return new Query(this, defs);
  }

  //=========================================================
  // Internal
  //=========================================================

  private arch_get(id: ArchetypeID): Archetype {
    const archetype = this.archetype_table.get(id);
    if (archetype === undefined) {
      throw new ECSError(
        ECS_ERROR.ARCHETYPE_NOT_FOUND,
        `Archetype with ID ${id} not found`,
        { archetype_id: id },
      );
    }
    return archetype;
  }

  private alloc_archetype_id(): ArchetypeID {
    return as_archetype_id(this.next_archetype_id++);
  }

  /** First entity: place it in the archetype holding exactly `def`. */
  private insert_entity<T>(
    entity: EntityID,
    def: ComponentDef<T>,
    value: T,
  ): void {
    const target =
      this.find_archetype([def], def) ??
      this.register_archetype(
        new Archetype(
          this.alloc_archetype_id(),
          [this.components.create_column(def)],
          this.initial_capacity,
        ),
      );

    const row = target.add_entity(entity);
    target.push(def, value);
    this.entity_index.set(entity, { archetype_id: target.id, row });
  }

  /**
   * Exact type-set lookup. Scans the archetypes indexed under `anchor`
   * (which must be one of `types`) for one with the same size whose every
   * type is in `types`. An empty `types` resolves to the zero-component
   * archetype.
   */
  private find_archetype(
    types: readonly ComponentID[],
    anchor: ComponentID | undefined,
  ): Archetype | undefined {
    if (anchor === undefined) {
      return this.empty_archetype_id === null
        ? undefined
        : this.arch_get(this.empty_archetype_id);
    }

    const candidates = this.component_index.get(anchor);
    if (candidates === undefined) return undefined;

    for (const id of candidates) {
      const archetype = this.arch_get(id);
      if (archetype.types.length !== types.length) continue;
      let same = true;
      for (let i = 0; i < types.length; i++) {
        if (!archetype.has_component(types[i])) {
          same = false;
          break;
        }
      }
      if (same) return archetype;
    }
    return undefined;
  }

  private register_archetype(archetype: Archetype): Archetype {
    this.archetype_table.set(archetype.id, archetype);

    if (archetype.types.length === 0) {
      this.empty_archetype_id = archetype.id;
    }
    for (let i = 0; i < archetype.types.length; i++) {
      const type = archetype.types[i];
      let set = this.component_index.get(type);
      if (set === undefined) {
        set = new Set();
        this.component_index.set(type, set);
      }
      set.add(archetype.id);
    }
    return archetype;
  }

  private remove_archetype(id: ArchetypeID): void {
    const archetype = this.arch_get(id);
    this.archetype_table.delete(id);

    if (this.empty_archetype_id === id) this.empty_archetype_id = null;
    for (let i = 0; i < archetype.types.length; i++) {
      const type = archetype.types[i];
      const set = this.component_index.get(type);
      if (set === undefined) continue;
      set.delete(id);
      if (set.size === 0) this.component_index.delete(type);
    }
  }

  // Every archetype left is empty; next_archetype_id keeps counting
  private clear_archetypes(): void {
    this.archetype_table.clear();
    this.component_index.clear();
    this.empty_archetype_id = null;
  }

  /**
   * Move `entity`'s row from `source` into a new row of `target`. Shared
   * columns migrate; columns only `source` has drop the value. Columns
   * only `target` has are left one short for the caller to fill.
   */
  private move_entity(
    entity: EntityID,
    record: EntityRecord,
    source: Archetype,
    target: Archetype,
  ): void {
    const src_row = record.row;
    align_and_migrate(source, target, src_row);

    const swapped = source.release_row(src_row);
    this.fix_swapped_row(source, src_row, swapped);

    record.archetype_id = target.id;
    record.row = target.add_entity(entity);
  }

  /** Point the record of the entity a swap-remove moved at its new row. */
  private fix_swapped_row(
    archetype: Archetype,
    row: number,
    swapped: EntityID | typeof NO_SWAP,
  ): void {
    if (swapped === NO_SWAP) return;
    const moved = this.entity_index.get(swapped);
    if (moved === undefined || moved.archetype_id !== archetype.id) {
      throw new ECSError(
        ECS_ERROR.ENTITY_NOT_FOUND,
        `Entity ${swapped} moved to row ${row} of archetype ${archetype.id} has no record there`,
        { entity: swapped, archetype_id: archetype.id, row },
      );
    }
    moved.row = row;
  }

  private check_aligned(archetype: Archetype): void {
    if (!archetype.is_aligned()) {
      throw new ECSError(
        ECS_ERROR.ROW_OUT_OF_BOUNDS,
        `Archetype ${archetype.id} columns are out of step with its ${archetype.entity_count} rows`,
        { archetype_id: archetype.id },
      );
    }
  }
}
