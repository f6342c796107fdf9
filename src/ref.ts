/***
 * ComponentRef — Read/write handle to one component value in a column.
 *
 * Plain query iteration hands out values. For object components that is
 * already enough to mutate them in place, but a number or string cannot
 * be written back through a copy. A ComponentRef binds a column and a row
 * once, so `ref.value = x` writes straight into the column slot.
 *
 * Refs are what Query.iter_mut() yields. A ref is valid until the next
 * structural change (add/remove component, remove entity) of its Storage,
 * which may move the row.
 *
 * Usage:
 *
 *   for (const [pos, vel] of storage.query(Pos, Vel).iter_mut()) {
 *     pos.value = pos.value + vel.value * dt;
 *   }
 *
 ***/

import type { Column } from "./column";
import type { AnyComponentDef, ComponentValue } from "./component";

export interface ComponentRef<T> {
  value: T;
  readonly row: number;
}

/** Maps a tuple of handles to the tuple of refs over their value types. */
export type ComponentRefs<Defs extends readonly AnyComponentDef[]> = {
  -readonly [K in keyof Defs]: ComponentRef<ComponentValue<Defs[K]>>;
};

class ColumnRef<T> implements ComponentRef<T> {
  constructor(
    private readonly _column: Column<T>,
    public readonly row: number,
  ) {}

  get value(): T {
    return this._column.get(this.row);
  }

  set value(v: T) {
    this._column.set(this.row, v);
  }
}

/** Create a ref bound to `row` of `column`. */
export function create_ref<T>(column: Column<T>, row: number): ComponentRef<T> {
  return new ColumnRef(column, row);
}
