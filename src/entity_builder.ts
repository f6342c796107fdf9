/***
 * EntityBuilder — Typestate builder for entities with at least one component.
 *
 * An entity without components cannot be stored, so build() only exists
 * on a builder that has had with() called at least once:
 *
 *   const e = world.build_entity()
 *     .with(Name, "Player")
 *     .with(Health, 100)
 *     .build();
 *
 *   world.build_entity().build();   // compile error
 *
 * Each with() attaches immediately through Storage.add_component, so a
 * builder that is dropped before build() still leaves its entity stored.
 *
 ***/

import type { ComponentDef } from "./component";
import type { EntityID } from "./entity";
import type { Storage } from "./storage";

export class EntityBuilder<HasComponents extends boolean = false> {
  // type-level only; records whether with() has been called
  private declare readonly _has_components: HasComponents;

  constructor(
    private readonly storage: Storage,
    readonly entity: EntityID,
  ) {}

  with<T>(def: ComponentDef<T>, value: T): EntityBuilder<true> {
    this.storage.add_component(this.entity, def, value);
    return new EntityBuilder<true>(this.storage, this.entity);
  }

  build(this: EntityBuilder<true>): EntityID {
    return this.entity;
  }
}
