/***
 * Brand — Nominal typing for TypeScript.
 *
 * Brand<T, Name> intersects T with a phantom readonly symbol property
 * tagged with Name. The symbol never exists at runtime; it only stops
 * structurally identical ids from being mixed up at compile time.
 *
 * Example: EntityID, ComponentID and ArchetypeID are all numbers at
 * runtime, but Brand<number, "entity_id"> and Brand<number, "archetype_id">
 * are not assignable to each other.
 *
 ***/

declare const brand: unique symbol;

export type Brand<T, BrandName extends string> = T & {
  readonly [brand]: BrandName;
};
