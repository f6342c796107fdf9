/***
 * Archetype — Dense table of entities sharing one exact component set.
 *
 * An archetype holds a strictly ascending list of ComponentIDs (`types`)
 * and one column per type, index-aligned with it: columns[i] holds the
 * values of types[i]. Row k of every column belongs to the same entity,
 * and a parallel Uint32Array records which entity that is.
 *
 *   types    [ 0:Position , 3:Velocity , 7:Name ]
 *   columns  [ col(0)     , col(3)     , col(7) ]
 *   entities [ e4, e9, e2 ]        ← row 0, 1, 2
 *
 * There is no archetype graph. A new archetype is derived from an
 * existing one by adding or removing a single type (from_add/from_remove);
 * the Storage finds existing archetypes through its type index instead
 * of cached edges.
 *
 * Moving one entity between archetypes is a merge-join over the two
 * sorted type lists (align_and_migrate): only columns present on both
 * sides transfer a value. The caller then evacuates whatever the source
 * still holds for that row (release_row) and, when adding a type, pushes
 * the new value into the target's new column.
 *
 ***/

import {
  type Brand,
  GrowableUint32Array,
  is_non_negative_integer,
  unsafe_cast,
  validate_and_cast,
} from "type_primitives";
import type { AnyColumn, Column } from "./column";
import type { ComponentDef, ComponentID } from "./component";
import type { EntityID } from "./entity";
import { ECS_ERROR, ECSError } from "./utils/error";
import { DEFAULT_COLUMN_CAPACITY, NO_SWAP } from "./utils/constants";
import { is_strictly_ascending, sorted_index_of } from "./utils/arrays";

export type ArchetypeID = Brand<number, "archetype_id">;

export const as_archetype_id = (value: number) =>
  validate_and_cast<number, ArchetypeID>(
    value,
    is_non_negative_integer,
    "ArchetypeID must be a non-negative integer",
  );

export class Archetype {
  readonly id: ArchetypeID;
  readonly types: readonly ComponentID[];
  readonly columns: readonly AnyColumn[];

  private readonly _entity_ids: GrowableUint32Array;
  private readonly _initial_capacity: number;

  constructor(
    id: ArchetypeID,
    columns: readonly AnyColumn[],
    initial_capacity: number = DEFAULT_COLUMN_CAPACITY,
  ) {
    const sorted = columns
      .slice()
      .sort((a, b) => a.element_type - b.element_type);
    const types = sorted.map((column) => column.element_type);

    if (!is_strictly_ascending(types)) {
      throw new ECSError(
        ECS_ERROR.COMPONENT_ALREADY_PRESENT,
        `Archetype ${id} would hold the same component type twice`,
        { archetype_id: id, types },
      );
    }

    this.id = id;
    this.types = types;
    this.columns = sorted;
    this._initial_capacity = initial_capacity;
    this._entity_ids = new GrowableUint32Array(initial_capacity);
  }

  //=========================================================
  // Derivation
  //=========================================================

  /**
   * Derive an empty archetype with `source`'s types plus the type of
   * `column`. Only the column's kind is used; the new archetype gets an
   * empty column of the same kind.
   */
  public static from_add(
    source: Archetype,
    id: ArchetypeID,
    column: AnyColumn,
  ): Archetype {
    if (source.has_component(column.element_type)) {
      throw new ECSError(
        ECS_ERROR.COMPONENT_ALREADY_PRESENT,
        `Archetype ${source.id} already holds component ${column.element_type}`,
        { archetype_id: source.id, component_id: column.element_type },
      );
    }
    const columns = source.columns.map((c) => c.new_empty_same_type());
    columns.push(column.new_empty_same_type());
    return new Archetype(id, columns, source._initial_capacity);
  }

  /** Derive an empty archetype with `source`'s types minus `removed`. */
  public static from_remove(
    source: Archetype,
    id: ArchetypeID,
    removed: ComponentID,
  ): Archetype {
    const index = source.column_index(removed);
    if (index === -1) {
      throw new ECSError(
        ECS_ERROR.COMPONENT_NOT_PRESENT,
        `Archetype ${source.id} does not hold component ${removed}`,
        { archetype_id: source.id, component_id: removed },
      );
    }
    const columns: AnyColumn[] = [];
    for (let i = 0; i < source.columns.length; i++) {
      if (i !== index) columns.push(source.columns[i].new_empty_same_type());
    }
    return new Archetype(id, columns, source._initial_capacity);
  }

  //=========================================================
  // Lookup
  //=========================================================

  public get entity_count(): number {
    return this._entity_ids.length;
  }

  /** Row → entity view. Valid until the next entity is added. */
  public get entity_list(): Uint32Array {
    return this._entity_ids.view();
  }

  public entity_at(row: number): EntityID {
    return unsafe_cast<EntityID>(this._entity_ids.get(row));
  }

  public has_component(type: ComponentID): boolean {
    return sorted_index_of(this.types, type) !== -1;
  }

  /** Position of `type` in `types`/`columns`, or -1. */
  public column_index(type: ComponentID): number {
    return sorted_index_of(this.types, type);
  }

  public get_column<T>(def: ComponentDef<T>): Column<T> {
    const index = this.column_index(def);
    if (index === -1) {
      throw new ECSError(
        ECS_ERROR.COMPONENT_NOT_PRESENT,
        `Component ${def} not in archetype ${this.id}`,
        { archetype_id: this.id, component_id: def },
      );
    }
    // the column at `index` was built for `def`, so its values are T
    return unsafe_cast<Column<T>>(this.columns[index]);
  }

  /** True when every column has exactly one value per entity row. */
  public is_aligned(): boolean {
    const count = this.entity_count;
    for (let i = 0; i < this.columns.length; i++) {
      if (this.columns[i].length !== count) return false;
    }
    return true;
  }

  //=========================================================
  // Mutation
  //=========================================================

  /** Append `value` to the column for `def`. */
  public push<T>(def: ComponentDef<T>, value: T): void {
    this.get_column(def).push(value);
  }

  /**
   * Append `entity` to the row list and return its row. Column values are
   * pushed separately (by migration and push) and must catch up before
   * the next structural change.
   */
  public add_entity(entity: EntityID): number {
    const row = this._entity_ids.length;
    this._entity_ids.push(entity);
    return row;
  }

  /**
   * Swap-remove `row` from every column that still holds it and from the
   * entity list. A column already shortened by align_and_migrate is left
   * alone. Returns the entity that now occupies `row`, or NO_SWAP when
   * `row` was the last one.
   */
  public release_row(row: number): EntityID | typeof NO_SWAP {
    const count = this._entity_ids.length;
    if (!Number.isInteger(row) || row < 0 || row >= count) {
      throw new ECSError(
        ECS_ERROR.ROW_OUT_OF_BOUNDS,
        `Row ${row} out of bounds for archetype ${this.id} with ${count} entities`,
        { archetype_id: this.id, row, entity_count: count },
      );
    }

    const columns = this.columns;
    for (let i = 0; i < columns.length; i++) {
      if (columns[i].length === count) columns[i].swap_remove(row);
    }

    const last_row = count - 1;
    const swapped =
      row === last_row ? NO_SWAP : this.entity_at(last_row);
    this._entity_ids.swap_remove(row);
    return swapped;
  }
}

/**
 * Move the values at `source_row` from every column `source` shares with
 * `target` onto the end of the matching `target` column.
 *
 * Merge-join over the two sorted type lists: advance the cursor holding
 * the smaller id, migrate on a tie. Runs in O(|source.types| + |target.types|).
 * Columns only `target` has receive nothing; columns only `source` has
 * keep their value.
 */
export function align_and_migrate(
  source: Archetype,
  target: Archetype,
  source_row: number,
): void {
  const src_types = source.types;
  const dst_types = target.types;
  let i = 0;
  let j = 0;

  while (i < src_types.length && j < dst_types.length) {
    if (src_types[i] < dst_types[j]) {
      i++;
    } else if (src_types[i] > dst_types[j]) {
      j++;
    } else {
      const col_source = source.columns[i];
      // skip a row an earlier tie in this call already evacuated
      if (source_row < col_source.length) {
        col_source.migrate_element(source_row, target.columns[j]);
      }
      i++;
      j++;
    }
  }
}
