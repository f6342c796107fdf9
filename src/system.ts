/***
 * System — Function-based system types.
 *
 * Systems are plain functions, not classes. A SystemConfig defines the
 * system's update function and optional lifecycle hooks.
 * World.register_system() assigns a unique SystemID and returns a frozen
 * SystemDescriptor, the handle later passed to remove_system().
 *
 * Lifecycle:
 *   on_added(storage)  — called once when the system is registered
 *   fn(storage, dt)    — called on every world.update(dt)
 *   on_removed()       — called when the system is unregistered
 *   dispose()          — called during world.dispose()
 *
 ***/

import {
  type Brand,
  validate_and_cast,
  is_non_negative_integer,
} from "type_primitives";
import type { Storage } from "./storage";

export type SystemID = Brand<number, "system_id">;

export const as_system_id = (value: number) =>
  validate_and_cast<number, SystemID>(
    value,
    is_non_negative_integer,
    "SystemID must be a non-negative integer",
  );

export type SystemFn = (storage: Storage, delta_time: number) => void;

export interface SystemConfig {
  fn: SystemFn;
  name?: string;
  on_added?: (storage: Storage) => void;
  on_removed?: () => void;
  dispose?: () => void;
}

export interface SystemDescriptor extends Readonly<SystemConfig> {
  readonly id: SystemID;
}
