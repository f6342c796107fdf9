/***
 * World — Public ECS facade.
 *
 * Owns one Storage, the entity id counter and an ordered list of
 * systems. Systems receive the Storage directly: registration, queries
 * and structural changes all go through it.
 *
 * Entity ids are handed out sequentially from 0 and never reused.
 *
 * Usage:
 *
 *   const world = new World();
 *
 *   const Pos = world.register_component<{ x: number; y: number }>("Pos");
 *   const Speed = world.register_numeric("f32", "Speed");
 *
 *   world.build_entity().with(Pos, { x: 0, y: 0 }).with(Speed, 2).build();
 *
 *   world.register_system({
 *     name: "move",
 *     fn(storage, dt) {
 *       for (const [pos, speed] of storage.query(Pos, Speed)) {
 *         pos.x += speed * dt;
 *       }
 *     },
 *   });
 *
 *   // game loop
 *   world.update(1 / 60);
 *
 ***/

import type { TypedArrayTag } from "type_primitives";
import type { ComponentDef } from "./component";
import { EntityBuilder } from "./entity_builder";
import { as_entity_id, type EntityID } from "./entity";
import { Storage, type StorageOptions } from "./storage";
import {
  as_system_id,
  type SystemConfig,
  type SystemDescriptor,
} from "./system";
import { ECS_ERROR, ECSError } from "./utils/error";
import { FIRST_ENTITY_ID, MAX_ENTITY_ID } from "./utils/constants";

export interface WorldOptions extends StorageOptions {}

export class World {
  readonly storage: Storage;

  private systems: Set<SystemDescriptor> = new Set();
  private next_system_id = 0;
  private next_entity_id = FIRST_ENTITY_ID;

  constructor(options?: WorldOptions) {
    this.storage = new Storage(options);
  }

  //=========================================================
  // Components
  //=========================================================

  register_component<T>(name?: string): ComponentDef<T> {
    return this.storage.register_component<T>(name);
  }

  register_numeric(tag: TypedArrayTag, name?: string): ComponentDef<number> {
    return this.storage.register_numeric(tag, name);
  }

  //=========================================================
  // Entities
  //=========================================================

  /**
   * Allocate a fresh entity id. The entity is not stored until its first
   * component is attached.
   */
  create_entity(): EntityID {
    if (this.next_entity_id > MAX_ENTITY_ID) {
      throw new ECSError(
        ECS_ERROR.INVALID_ENTITY_ID,
        "Entity id space exhausted",
        { next_entity_id: this.next_entity_id },
      );
    }
    return as_entity_id(this.next_entity_id++);
  }

  /** Start building a new entity; see EntityBuilder. */
  build_entity(): EntityBuilder {
    return new EntityBuilder(this.storage, this.create_entity());
  }

  get entity_count(): number {
    return this.storage.entity_count;
  }

  //=========================================================
  // Systems
  //=========================================================

  /**
   * Register a system and call its on_added hook. Systems run in
   * registration order. Passing an already registered descriptor throws.
   */
  register_system(config: SystemConfig): SystemDescriptor {
    if (this.is_registered(config)) {
      throw new ECSError(
        ECS_ERROR.DUPLICATE_SYSTEM,
        `System ${config.name ?? "<anonymous>"} is already registered`,
        { name: config.name },
      );
    }

    const descriptor: SystemDescriptor = Object.freeze({
      ...config,
      id: as_system_id(this.next_system_id++),
    });
    this.systems.add(descriptor);
    descriptor.on_added?.(this.storage);
    return descriptor;
  }

  /** Unregister a system and call its on_removed hook. No-op if unknown. */
  remove_system(system: SystemDescriptor): void {
    if (!this.systems.delete(system)) return;
    system.on_removed?.();
  }

  get system_count(): number {
    return this.systems.size;
  }

  /** Run every system once, in registration order. */
  update(delta_time: number): void {
    for (const descriptor of this.systems) {
      descriptor.fn(this.storage, delta_time);
    }
  }

  /** Call every system's dispose hook and drop all systems. */
  dispose(): void {
    for (const descriptor of this.systems) {
      descriptor.dispose?.();
    }
    this.systems.clear();
  }

  private is_registered(config: SystemConfig): boolean {
    for (const descriptor of this.systems) {
      if (descriptor === config) return true;
    }
    return false;
  }
}
