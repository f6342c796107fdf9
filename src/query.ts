/***
 * Query — Set-intersection lookup plus zipped column iteration.
 *
 * A Query<Defs> names 1..4 distinct component types. Each time it is
 * iterated it:
 *
 *   1. fetches, per requested type, the set of archetype ids from the
 *      Storage's type index,
 *   2. intersects the sets, starting from the smallest one so the work is
 *      bounded by the rarest type,
 *   3. for every matching archetype (ascending id), picks its columns in
 *      the *requested* order and walks rows 0..entity_count-1, yielding
 *      one tuple per row.
 *
 * Nothing is cached: a Query always reflects the Storage as it is when
 * iteration starts, and must not be iterated across a structural change.
 *
 * Usage:
 *
 *   for (const [pos, vel] of storage.query(Pos, Vel)) { ... }      // values
 *   for (const [hp] of storage.query(Health).iter_mut()) hp.value -= 1;
 *   storage.query(Pos, Vel).each((pos, vel, n) => {                // batch
 *     for (let i = 0; i < n; i++) pos.set(i, pos.get(i) + vel.get(i));
 *   });
 *
 ***/

import { unsafe_cast } from "type_primitives";
import type { Archetype, ArchetypeID } from "./archetype";
import type { Column } from "./column";
import type {
  AnyComponentDef,
  ComponentID,
  ComponentValue,
  ComponentValues,
} from "./component";
import type { EntityID } from "./entity";
import { create_ref, type ComponentRef, type ComponentRefs } from "./ref";
import type { Storage } from "./storage";
import { ECS_ERROR, ECSError } from "./utils/error";

/** Accepted argument lists of Storage.query: one to four handles. */
export type QueryDefs =
  | [AnyComponentDef]
  | [AnyComponentDef, AnyComponentDef]
  | [AnyComponentDef, AnyComponentDef, AnyComponentDef]
  | [AnyComponentDef, AnyComponentDef, AnyComponentDef, AnyComponentDef];

// Maps a tuple of handles to the tuple of their typed columns.
type DefsToColumns<Defs extends readonly AnyComponentDef[]> = {
  -readonly [K in keyof Defs]: Column<ComponentValue<Defs[K]>>;
};

// each() callback: one column per requested type, then the row count.
type EachFn<Defs extends readonly AnyComponentDef[]> = (
  ...args: [...DefsToColumns<Defs>, number]
) => void;

const EMPTY_IDS: ReadonlySet<ArchetypeID> = new Set();

/**
 * Throws unless `types` is non-empty and pairwise distinct. A query
 * naming the same type twice has no meaning.
 */
export function assert_query_types(types: readonly ComponentID[]): void {
  if (types.length === 0) {
    throw new ECSError(
      ECS_ERROR.EMPTY_QUERY,
      "A query needs at least one component type",
    );
  }
  if (new Set(types).size !== types.length) {
    throw new ECSError(
      ECS_ERROR.DUPLICATE_QUERY_COMPONENT,
      "Component types must be different when querying more than one component type",
      { types: types.slice() },
    );
  }
}

/**
 * Ids of the archetypes that hold every one of `types`, ascending.
 * Intersects the per-type index sets starting from the smallest.
 */
export function get_archetype_ids_for_types(
  storage: Storage,
  types: readonly ComponentID[],
): ArchetypeID[] {
  assert_query_types(types);

  const sets: ReadonlySet<ArchetypeID>[] = [];
  let smallest = 0;
  for (let i = 0; i < types.length; i++) {
    const set = storage.get_archetype_ids_for_component(types[i]) ?? EMPTY_IDS;
    // a type no archetype holds empties the whole intersection
    if (set.size === 0) return [];
    sets.push(set);
    if (set.size < sets[smallest].size) smallest = i;
  }

  const result: ArchetypeID[] = [];
  for (const id of sets[smallest]) {
    let in_all = true;
    for (let i = 0; i < sets.length; i++) {
      if (i !== smallest && !sets[i].has(id)) {
        in_all = false;
        break;
      }
    }
    if (in_all) result.push(id);
  }

  return result.sort((a, b) => a - b);
}

export class Query<Defs extends readonly AnyComponentDef[]> {
  private readonly _storage: Storage;
  private readonly _defs: Defs;

  constructor(storage: Storage, defs: Defs) {
    assert_query_types(defs);
    this._storage = storage;
    this._defs = defs;
  }

  get defs(): Defs {
    return this._defs;
  }

  /** Archetypes currently matching, ascending id (including empty ones). */
  get archetypes(): Archetype[] {
    const ids = get_archetype_ids_for_types(this._storage, this._defs);
    const result: Archetype[] = [];
    for (let i = 0; i < ids.length; i++) {
      const archetype = this._storage.get_archetype(ids[i]);
      if (archetype === undefined) {
        throw new ECSError(
          ECS_ERROR.ARCHETYPE_NOT_FOUND,
          `Type index lists archetype ${ids[i]} which does not exist`,
          { archetype_id: ids[i] },
        );
      }
      result.push(archetype);
    }
    return result;
  }

  /** Total entity count across all matching archetypes. */
  count(): number {
    const archs = this.archetypes;
    let total = 0;
    for (let i = 0; i < archs.length; i++) total += archs[i].entity_count;
    return total;
  }

  /** Value tuples, in requested type order. */
  *[Symbol.iterator](): Iterator<ComponentValues<Defs>> {
    for (const archetype of this.archetypes) {
      const columns = this.columns_of(archetype);
      const n = archetype.entity_count;
      for (let row = 0; row < n; row++) {
        yield unsafe_cast<ComponentValues<Defs>>(read_row(columns, row));
      }
    }
  }

  /** [entity, values] pairs, in requested type order. */
  *entries(): IterableIterator<[EntityID, ComponentValues<Defs>]> {
    for (const archetype of this.archetypes) {
      const columns = this.columns_of(archetype);
      const n = archetype.entity_count;
      for (let row = 0; row < n; row++) {
        yield [
          archetype.entity_at(row),
          unsafe_cast<ComponentValues<Defs>>(read_row(columns, row)),
        ];
      }
    }
  }

  /**
   * Tuples of read/write refs, in requested type order. Each archetype and
   * each of its columns is visited once, so no two refs handed out by one
   * pass point at the same slot.
   */
  *iter_mut(): IterableIterator<ComponentRefs<Defs>> {
    for (const archetype of this.archetypes) {
      const columns = this.columns_of(archetype);
      const n = archetype.entity_count;
      for (let row = 0; row < n; row++) {
        const refs: ComponentRef<unknown>[] = [];
        for (let c = 0; c < columns.length; c++) {
          refs.push(create_ref(columns[c], row));
        }
        yield unsafe_cast<ComponentRefs<Defs>>(refs);
      }
    }
  }

  /**
   * Batch iteration. Calls fn once per non-empty matching archetype with
   * its columns (requested order) and row count; fn loops over the rows.
   */
  each(fn: EachFn<Defs>): void {
    for (const archetype of this.archetypes) {
      const count = archetype.entity_count;
      if (count === 0) continue;
      const args: unknown[] = this.columns_of(archetype);
      args.push(count);
      unsafe_cast<(...a: unknown[]) => void>(fn)(...args);
    }
  }

  //=========================================================
  // Internal
  //=========================================================

  private columns_of(archetype: Archetype): Column<unknown>[] {
    const defs = this._defs;
    const columns: Column<unknown>[] = [];
    for (let i = 0; i < defs.length; i++) {
      columns.push(archetype.get_column(defs[i]));
    }
    return columns;
  }
}

function read_row(columns: readonly Column<unknown>[], row: number): unknown[] {
  const values: unknown[] = [];
  for (let c = 0; c < columns.length; c++) values.push(columns[c].get(row));
  return values;
}
