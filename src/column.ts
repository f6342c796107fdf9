/***
 * Column — Type-erased dense sequence of one component type's values.
 *
 * Every archetype stores one column per component type it contains. The
 * archetype only ever talks to its columns through AnyColumn, the erased
 * capability set: length, element type, swap-remove, fresh empty copy,
 * and migration of one element into a column of the same concrete kind.
 * Typed access (get/set/push) lives on Column<T> and is reached through
 * Archetype.get_column(def), which matches on element_type.
 *
 * Two concrete kinds:
 *   ArrayColumn<T>  — plain JS array, any value type
 *   NumericColumn   — GrowableTypedArray of a fixed element tag (i32, f32, ...)
 *
 * Removal is always swap-remove: the last element moves into the vacated
 * slot. Callers keep all columns of one archetype in lock-step.
 *
 ***/

import {
  create_growable_array,
  type AnyTypedArray,
  type GrowableTypedArray,
  type TypedArrayTag,
} from "type_primitives";
import type { ComponentID } from "./component";
import { ECS_ERROR, ECSError } from "./utils/error";
import { DEFAULT_COLUMN_CAPACITY } from "./utils/constants";

export interface AnyColumn {
  readonly element_type: ComponentID;
  readonly length: number;
  is_empty(): boolean;
  new_empty_same_type(): AnyColumn;
  swap_remove(index: number): void;
  /**
   * Swap-remove the element at `index` and append it to `target`.
   * `target` must be the same concrete column kind and element type.
   */
  migrate_element(index: number, target: AnyColumn): void;
}

export abstract class Column<T> implements AnyColumn, Iterable<T> {
  constructor(public readonly element_type: ComponentID) {}

  abstract get length(): number;
  abstract get(index: number): T;
  abstract set(index: number, value: T): void;
  abstract push(value: T): void;
  abstract new_empty_same_type(): Column<T>;

  /** Remove by swap-remove and return the removed value. */
  public take(index: number): T {
    this.check_bounds(index);
    return this.take_unchecked(index);
  }

  public is_empty(): boolean {
    return this.length === 0;
  }

  public swap_remove(index: number): void {
    this.check_bounds(index);
    this.take_unchecked(index);
  }

  public migrate_element(index: number, target: AnyColumn): void {
    if (!this.accepts(target)) {
      throw new ECSError(
        ECS_ERROR.COLUMN_TYPE_MISMATCH,
        `Cannot migrate component ${this.element_type} into a column of component ${target.element_type}`,
        { source: this.element_type, target: target.element_type },
      );
    }
    target.push(this.take(index));
  }

  *[Symbol.iterator](): Iterator<T> {
    const len = this.length;
    for (let i = 0; i < len; i++) yield this.get(i);
  }

  protected abstract take_unchecked(index: number): T;

  /** True when `target` has the same concrete kind and element type. */
  protected abstract accepts(target: AnyColumn): target is Column<T>;

  private check_bounds(index: number): void {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new ECSError(
        ECS_ERROR.ROW_OUT_OF_BOUNDS,
        `Row ${index} out of bounds for column of length ${this.length}`,
        { element_type: this.element_type, index, length: this.length },
      );
    }
  }
}

export class ArrayColumn<T> extends Column<T> {
  private readonly _items: T[] = [];

  public get length(): number {
    return this._items.length;
  }

  /** Live view of the values. Do not mutate. */
  public get items(): readonly T[] {
    return this._items;
  }

  public get(index: number): T {
    return this._items[index];
  }

  public set(index: number, value: T): void {
    this._items[index] = value;
  }

  public push(value: T): void {
    this._items.push(value);
  }

  public new_empty_same_type(): ArrayColumn<T> {
    return new ArrayColumn<T>(this.element_type);
  }

  protected take_unchecked(index: number): T {
    const items = this._items;
    const removed = items[index];
    const last = items.length - 1;
    items[index] = items[last];
    items.length = last;
    return removed;
  }

  protected accepts(target: AnyColumn): target is Column<T> {
    return (
      target instanceof ArrayColumn &&
      target.element_type === this.element_type
    );
  }
}

export class NumericColumn extends Column<number> {
  private readonly _data: GrowableTypedArray<AnyTypedArray>;

  constructor(
    element_type: ComponentID,
    public readonly tag: TypedArrayTag,
    private readonly initial_capacity: number = DEFAULT_COLUMN_CAPACITY,
  ) {
    super(element_type);
    this._data = create_growable_array(tag, initial_capacity);
  }

  public get length(): number {
    return this._data.length;
  }

  /** Typed-array view of the values (0..length-1). Invalidated by growth. */
  public view(): AnyTypedArray {
    return this._data.view();
  }

  public get(index: number): number {
    return this._data.get(index);
  }

  public set(index: number, value: number): void {
    this._data.set_at(index, value);
  }

  public push(value: number): void {
    this._data.push(value);
  }

  public new_empty_same_type(): NumericColumn {
    return new NumericColumn(this.element_type, this.tag, this.initial_capacity);
  }

  protected take_unchecked(index: number): number {
    return this._data.swap_remove(index);
  }

  protected accepts(target: AnyColumn): target is Column<number> {
    return (
      target instanceof NumericColumn &&
      target.element_type === this.element_type &&
      target.tag === this.tag
    );
  }
}
