/***
 * Component — Phantom-typed component handles.
 *
 * A component type is registered once per Storage and identified by a
 * ComponentID (a branded sequential number). That number is the erased
 * runtime identity of the type: archetypes sort their columns by it, the
 * type index is keyed by it, and queries match columns against it.
 *
 *   const Name = storage.register_component<string>("Name");
 *   const Health = storage.register_numeric("i32", "Health");
 *
 * At runtime a ComponentDef<T> is just its ComponentID. The generic T is
 * carried only at compile time, so storage.add_component(e, Health, 10)
 * type-checks while storage.add_component(e, Health, "10") does not.
 *
 ***/

import {
  type Brand,
  validate_and_cast,
  is_non_negative_integer,
} from "type_primitives";

export type ComponentID = Brand<number, "component_id">;
export const as_component_id = (value: number) =>
  validate_and_cast<number, ComponentID>(
    value,
    is_non_negative_integer,
    "ComponentID must be a non-negative integer",
  );

// Phantom symbol: gives ComponentDef a type-level slot for the value type,
// so ComponentDef<string> and ComponentDef<number> stay distinct even
// though both are branded numbers.
declare const __value: unique symbol;

export type ComponentDef<T> = ComponentID & { readonly [__value]: T };

/** Any component handle, value type erased. */
export type AnyComponentDef = ComponentDef<unknown>;

/** Value type carried by a component handle. */
export type ComponentValue<D> = D extends ComponentDef<infer T> ? T : never;

/** Maps a tuple of handles to the tuple of their value types. */
export type ComponentValues<Defs extends readonly AnyComponentDef[]> = {
  -readonly [K in keyof Defs]: ComponentValue<Defs[K]>;
};

/** Storage kind of a component's columns. */
export type ColumnKind = "array" | "numeric";
