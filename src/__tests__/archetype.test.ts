import { describe, expect, it } from "vitest";
import { Archetype, align_and_migrate, as_archetype_id } from "../archetype";
import { ComponentRegistry } from "../component_registry";
import type { ComponentDef } from "../component";
import { as_entity_id } from "../entity";
import { ECS_ERROR } from "../utils/error";
import { NO_SWAP } from "../utils/constants";
import { error_category } from "./helpers";

// Helpers
const arch_id = (n: number) => as_archetype_id(n);
const entity = (n: number) => as_entity_id(n);

function setup() {
  const registry = new ComponentRegistry(4);
  const A = registry.register_numeric("i32", "A");
  const B = registry.register<string>("B");
  const C = registry.register<boolean>("C");
  return { registry, A, B, C };
}

function make_archetype(
  registry: ComponentRegistry,
  id: number,
  ...defs: ComponentDef<unknown>[]
): Archetype {
  return new Archetype(
    arch_id(id),
    defs.map((def) => registry.create_column(def)),
    4,
  );
}

describe("Archetype", () => {
  //=========================================================
  // Construction
  //=========================================================

  it("sorts columns by component id", () => {
    const { registry, A, B, C } = setup();
    const arch = make_archetype(registry, 0, C, A, B);
    expect(arch.types).toEqual([A, B, C]);
    expect(arch.columns.map((c) => c.element_type)).toEqual([A, B, C]);
  });

  it("starts with no entities", () => {
    const { registry, A } = setup();
    const arch = make_archetype(registry, 7, A);
    expect(arch.id).toBe(7);
    expect(arch.entity_count).toBe(0);
    expect(arch.entity_list.length).toBe(0);
  });

  it("rejects the same type twice", () => {
    const { registry, A } = setup();
    expect(error_category(() => make_archetype(registry, 0, A, A))).toBe(
      ECS_ERROR.COMPONENT_ALREADY_PRESENT,
    );
  });

  it("has_component and column_index", () => {
    const { registry, A, B, C } = setup();
    const arch = make_archetype(registry, 0, A, C);
    expect(arch.has_component(A)).toBe(true);
    expect(arch.has_component(B)).toBe(false);
    expect(arch.column_index(C)).toBe(1);
    expect(arch.column_index(B)).toBe(-1);
  });

  //=========================================================
  // Derivation
  //=========================================================

  it("from_add derives an empty archetype with one more type", () => {
    const { registry, A, B, C } = setup();
    const source = make_archetype(registry, 0, A, C);
    source.add_entity(entity(1));
    source.push(A, 5);
    source.push(C, true);

    const derived = Archetype.from_add(
      source,
      arch_id(1),
      registry.create_column(B),
    );
    expect(derived.id).toBe(1);
    expect(derived.types).toEqual([A, B, C]);
    expect(derived.entity_count).toBe(0);
    expect(derived.columns.every((c) => c.length === 0)).toBe(true);
    // source untouched
    expect(source.get_column(A).get(0)).toBe(5);
  });

  it("from_add of a type already present throws", () => {
    const { registry, A } = setup();
    const source = make_archetype(registry, 0, A);
    expect(
      error_category(() =>
        Archetype.from_add(source, arch_id(1), registry.create_column(A)),
      ),
    ).toBe(ECS_ERROR.COMPONENT_ALREADY_PRESENT);
  });

  it("from_remove derives an empty archetype with one type less", () => {
    const { registry, A, B, C } = setup();
    const source = make_archetype(registry, 0, A, B, C);
    const derived = Archetype.from_remove(source, arch_id(1), B);
    expect(derived.types).toEqual([A, C]);
    expect(derived.entity_count).toBe(0);
  });

  it("from_remove of the only type gives a zero-component archetype", () => {
    const { registry, A } = setup();
    const source = make_archetype(registry, 0, A);
    const derived = Archetype.from_remove(source, arch_id(1), A);
    expect(derived.types).toEqual([]);
    expect(derived.columns).toEqual([]);
  });

  it("from_remove of an absent type throws", () => {
    const { registry, A, B } = setup();
    const source = make_archetype(registry, 0, A);
    expect(
      error_category(() => Archetype.from_remove(source, arch_id(1), B)),
    ).toBe(ECS_ERROR.COMPONENT_NOT_PRESENT);
  });

  //=========================================================
  // Rows
  //=========================================================

  it("add_entity returns consecutive rows", () => {
    const { registry, A } = setup();
    const arch = make_archetype(registry, 0, A);
    expect(arch.add_entity(entity(10))).toBe(0);
    expect(arch.add_entity(entity(20))).toBe(1);
    expect(arch.entity_at(1)).toBe(20);
    expect(Array.from(arch.entity_list)).toEqual([10, 20]);
  });

  it("push appends to the column of the given type", () => {
    const { registry, A, B } = setup();
    const arch = make_archetype(registry, 0, A, B);
    arch.add_entity(entity(0));
    arch.push(A, 42);
    arch.push(B, "x");
    expect(arch.get_column(A).get(0)).toBe(42);
    expect(arch.get_column(B).get(0)).toBe("x");
    expect(arch.is_aligned()).toBe(true);
  });

  it("is_aligned is false while a column lags the row list", () => {
    const { registry, A, B } = setup();
    const arch = make_archetype(registry, 0, A, B);
    arch.add_entity(entity(0));
    arch.push(A, 1);
    expect(arch.is_aligned()).toBe(false);
  });

  it("get_column of an absent type throws COMPONENT_NOT_PRESENT", () => {
    const { registry, A, B } = setup();
    const arch = make_archetype(registry, 0, A);
    expect(error_category(() => arch.get_column(B))).toBe(
      ECS_ERROR.COMPONENT_NOT_PRESENT,
    );
  });

  it("release_row swap-removes and reports the moved entity", () => {
    const { registry, A, B } = setup();
    const arch = make_archetype(registry, 0, A, B);
    for (let i = 0; i < 3; i++) {
      arch.add_entity(entity(i));
      arch.push(A, i * 10);
      arch.push(B, `e${i}`);
    }

    expect(arch.release_row(0)).toBe(2);
    expect(Array.from(arch.entity_list)).toEqual([2, 1]);
    expect([...arch.get_column(A)]).toEqual([20, 10]);
    expect([...arch.get_column(B)]).toEqual(["e2", "e1"]);
  });

  it("release_row of the last row reports NO_SWAP", () => {
    const { registry, A } = setup();
    const arch = make_archetype(registry, 0, A);
    arch.add_entity(entity(4));
    arch.push(A, 1);
    arch.add_entity(entity(5));
    arch.push(A, 2);
    expect(arch.release_row(1)).toBe(NO_SWAP);
    expect(Array.from(arch.entity_list)).toEqual([4]);
  });

  it("release_row out of bounds throws ROW_OUT_OF_BOUNDS", () => {
    const { registry, A } = setup();
    const arch = make_archetype(registry, 0, A);
    expect(error_category(() => arch.release_row(0))).toBe(
      ECS_ERROR.ROW_OUT_OF_BOUNDS,
    );
  });
});

describe("align_and_migrate", () => {
  it("moves the shared column value and leaves the source one shorter", () => {
    const { registry, A } = setup();
    const source = make_archetype(registry, 0, A);
    const target = make_archetype(registry, 1, A);
    for (const v of [1, 2, 3]) {
      source.push(A, v);
      target.push(A, v);
    }

    align_and_migrate(source, target, 1);

    expect([...source.get_column(A)]).toEqual([1, 3]);
    expect([...target.get_column(A)]).toEqual([1, 2, 3, 2]);
  });

  it("adding a type: only source columns transfer", () => {
    const { registry, A, B, C } = setup();
    const source = make_archetype(registry, 0, A, C);
    source.add_entity(entity(0));
    source.push(A, 7);
    source.push(C, true);
    const target = Archetype.from_add(
      source,
      arch_id(1),
      registry.create_column(B),
    );

    align_and_migrate(source, target, 0);

    expect([...target.get_column(A)]).toEqual([7]);
    expect([...target.get_column(B)]).toEqual([]);
    expect([...target.get_column(C)]).toEqual([true]);
    expect(source.get_column(A).length).toBe(0);
    expect(source.get_column(C).length).toBe(0);
  });

  it("removing a type: the dropped column keeps its value until release_row", () => {
    const { registry, A, B } = setup();
    const source = make_archetype(registry, 0, A, B);
    for (let i = 0; i < 2; i++) {
      source.add_entity(entity(i));
      source.push(A, i);
      source.push(B, `b${i}`);
    }
    const target = Archetype.from_remove(source, arch_id(1), B);

    align_and_migrate(source, target, 0);
    expect([...source.get_column(A)]).toEqual([1]);
    expect([...source.get_column(B)]).toEqual(["b0", "b1"]);

    expect(source.release_row(0)).toBe(1);
    expect([...source.get_column(B)]).toEqual(["b1"]);
    expect(source.is_aligned()).toBe(true);
    expect([...target.get_column(A)]).toEqual([0]);
  });

  it("disjoint type lists migrate nothing", () => {
    const { registry, A, B } = setup();
    const source = make_archetype(registry, 0, A);
    source.push(A, 1);
    const target = make_archetype(registry, 1, B);
    align_and_migrate(source, target, 0);
    expect(source.get_column(A).length).toBe(1);
    expect(target.get_column(B).length).toBe(0);
  });

  it("a row past the source columns is skipped", () => {
    const { registry, A } = setup();
    const source = make_archetype(registry, 0, A);
    const target = make_archetype(registry, 1, A);
    source.push(A, 1);
    align_and_migrate(source, target, 3);
    expect([...source.get_column(A)]).toEqual([1]);
    expect(target.get_column(A).length).toBe(0);
  });
});
