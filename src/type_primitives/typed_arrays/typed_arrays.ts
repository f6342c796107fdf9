/***
 * GrowableTypedArray — TypedArray wrapper with amortised O(1) append.
 *
 * TypedArrays have a fixed length, so resizing means allocating a new
 * buffer and copying. GrowableTypedArray keeps a separate logical length
 * and doubles the backing buffer on overflow.
 *
 * Numeric component columns are allocated by element tag through
 * create_growable_array(tag); archetypes keep their row → entity list in a
 * GrowableUint32Array.
 *
 ***/

import {
  DEFAULT_INITIAL_CAPACITY,
  GROWTH_FACTOR,
} from "../../utils/constants";

export type TypedArrayTag =
  | "f32"
  | "f64"
  | "i8"
  | "i16"
  | "i32"
  | "u8"
  | "u16"
  | "u32";

export type AnyTypedArray =
  | Float32Array
  | Float64Array
  | Int8Array
  | Int16Array
  | Int32Array
  | Uint8Array
  | Uint16Array
  | Uint32Array;

export type TypedArrayCtor<T extends AnyTypedArray> = new (length: number) => T;

export const TYPED_ARRAY_CTORS = {
  f32: Float32Array,
  f64: Float64Array,
  i8: Int8Array,
  i16: Int16Array,
  i32: Int32Array,
  u8: Uint8Array,
  u16: Uint16Array,
  u32: Uint32Array,
} as const satisfies Record<TypedArrayTag, TypedArrayCtor<AnyTypedArray>>;

export const is_typed_array_tag = (value: string): value is TypedArrayTag =>
  Object.prototype.hasOwnProperty.call(TYPED_ARRAY_CTORS, value);

export class GrowableTypedArray<T extends AnyTypedArray> {
  private _buf: T;
  private _len = 0;

  constructor(
    private readonly _ctor: TypedArrayCtor<T>,
    initial_capacity = DEFAULT_INITIAL_CAPACITY,
  ) {
    this._buf = new _ctor(Math.max(1, initial_capacity));
  }

  public get length(): number {
    return this._len;
  }

  /** Backing buffer size; grows by GROWTH_FACTOR on overflow. */
  public get capacity(): number {
    return this._buf.length;
  }

  public push(value: number): void {
    if (this._len >= this._buf.length) this._grow();
    this._buf[this._len++] = value;
  }

  public pop(): number {
    return this._buf[--this._len];
  }

  public get(i: number): number {
    return this._buf[i];
  }

  public set_at(i: number, value: number): void {
    this._buf[i] = value;
  }

  /**
   * Move the last element into slot i, decrement length.
   * Returns the value that was removed from slot i.
   */
  public swap_remove(i: number): number {
    const removed = this._buf[i];
    this._buf[i] = this._buf[--this._len];
    return removed;
  }

  public clear(): void {
    this._len = 0;
  }

  /**
   * Raw backing buffer. Valid data: indices 0..length-1.
   * Stable until the next push() that triggers a grow.
   */
  public get buf(): T {
    return this._buf;
  }

  /**
   * Subarray view of valid data (0..length-1). Shares the backing buffer,
   * so a later push() that grows leaves the view pointing at stale memory.
   */
  public view(): T {
    // subarray on a union-typed receiver widens to the union; the concrete
    // type is the one this wrapper was constructed with.
    return this._buf.subarray(0, this._len) as T;
  }

  [Symbol.iterator](): Iterator<number> {
    let i = 0;
    const buf = this._buf;
    const len = this._len;
    return {
      next(): IteratorResult<number> {
        if (i < len) return { value: buf[i++], done: false };
        return { value: undefined, done: true };
      },
    };
  }

  /** Ensure the backing buffer can hold at least `capacity` elements without growing. */
  public ensure_capacity(capacity: number): void {
    if (capacity <= this._buf.length) return;
    let new_cap = this._buf.length;
    while (new_cap < capacity) new_cap *= GROWTH_FACTOR;
    this._reallocate(new_cap);
  }

  private _grow(): void {
    this._reallocate(this._buf.length * GROWTH_FACTOR);
  }

  private _reallocate(capacity: number): void {
    const next = new this._ctor(capacity);
    next.set(this._buf.subarray(0, this._len));
    this._buf = next;
  }
}

export class GrowableUint32Array extends GrowableTypedArray<Uint32Array> {
  constructor(initial_capacity = DEFAULT_INITIAL_CAPACITY) {
    super(Uint32Array, initial_capacity);
  }
}

/** Allocate an empty growable buffer for the given element tag. */
export function create_growable_array(
  tag: TypedArrayTag,
  initial_capacity = DEFAULT_INITIAL_CAPACITY,
): GrowableTypedArray<AnyTypedArray> {
  return new GrowableTypedArray<AnyTypedArray>(
    TYPED_ARRAY_CTORS[tag],
    initial_capacity,
  );
}
