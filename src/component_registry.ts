/***
 *
 * ComponentRegistry - Issues ComponentIDs and knows how to build their columns
 *
 * Each registered component records a display name and a column kind.
 * "array" components store arbitrary values in an ArrayColumn; "numeric"
 * components store numbers in a NumericColumn of a fixed element tag.
 * Archetypes never consult the registry directly: the Storage asks it for
 * a fresh column whenever a new archetype needs one for a type.
 *
 ***/

import { unsafe_cast, type TypedArrayTag } from "type_primitives";
import {
  as_component_id,
  type ColumnKind,
  type ComponentDef,
  type ComponentID,
} from "./component";
import { ArrayColumn, NumericColumn, type AnyColumn } from "./column";
import { ECS_ERROR, ECSError } from "./utils/error";
import { DEFAULT_COLUMN_CAPACITY } from "./utils/constants";

//=========================================================
// Internal types
//=========================================================

interface ComponentMeta {
  name: string;
  kind: ColumnKind;
  tag: TypedArrayTag | null;
}

//=========================================================
// ComponentRegistry
//=========================================================

export class ComponentRegistry {
  private readonly metas: ComponentMeta[] = [];

  constructor(
    private readonly initial_capacity: number = DEFAULT_COLUMN_CAPACITY,
  ) {}

  /** Number of registered components. */
  public get count(): number {
    return this.metas.length;
  }

  public is_registered(id: ComponentID): boolean {
    return id < this.metas.length;
  }

  public name_of(id: ComponentID): string {
    return this.meta(id).name;
  }

  public kind_of(id: ComponentID): ColumnKind {
    return this.meta(id).kind;
  }

  //=========================================================
  // Registration
  //=========================================================

  /** Register a component whose values live in a plain array column. */
  public register<T>(name?: string): ComponentDef<T> {
    return this.add_meta<T>("array", null, name);
  }

  /** Register a numeric component backed by a typed array of `tag`. */
  public register_numeric(
    tag: TypedArrayTag,
    name?: string,
  ): ComponentDef<number> {
    return this.add_meta<number>("numeric", tag, name);
  }

  //=========================================================
  // Column construction
  //=========================================================

  /** Fresh, empty column for a registered component. */
  public create_column(id: ComponentID): AnyColumn {
    const meta = this.meta(id);
    if (meta.tag !== null) {
      return new NumericColumn(id, meta.tag, this.initial_capacity);
    }
    return new ArrayColumn<unknown>(id);
  }

  //=========================================================
  // Internal
  //=========================================================

  private add_meta<T>(
    kind: ColumnKind,
    tag: TypedArrayTag | null,
    name: string | undefined,
  ): ComponentDef<T> {
    const id = as_component_id(this.metas.length);
    this.metas.push({ name: name ?? `Component#${id}`, kind, tag });
    return unsafe_cast<ComponentDef<T>>(id);
  }

  private meta(id: ComponentID): ComponentMeta {
    const meta = this.metas[id];
    if (meta === undefined) {
      throw new ECSError(
        ECS_ERROR.COMPONENT_NOT_REGISTERED,
        `Component ${id} is not registered`,
        { component_id: id },
      );
    }
    return meta;
  }
}
