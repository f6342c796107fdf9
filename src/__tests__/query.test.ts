import { describe, expect, it } from "vitest";
import { as_entity_id } from "../entity";
import { Query, get_archetype_ids_for_types } from "../query";
import { Storage } from "../storage";
import { ECS_ERROR } from "../utils/error";
import { error_category } from "./helpers";

// Helpers
const e = (n: number) => as_entity_id(n);

function setup() {
  const storage = new Storage();
  const I = storage.register_numeric("i32", "I");
  const F = storage.register_numeric("f32", "F");
  const Name = storage.register_component<string>("Name");
  const Tag = storage.register_component<{ kind: string }>("Tag");
  return { storage, I, F, Name, Tag };
}

describe("get_archetype_ids_for_types", () => {
  it("intersects the per-type archetype sets", () => {
    const { storage, I, F, Name } = setup();
    storage.add_component(e(0), I, 1); // [I]
    storage.add_component(e(1), I, 2);
    storage.add_component(e(1), F, 2); // [I, F]
    storage.add_component(e(2), I, 3);
    storage.add_component(e(2), Name, "c"); // [I, Name]
    storage.add_component(e(3), I, 4);
    storage.add_component(e(3), F, 4);
    storage.add_component(e(3), Name, "d"); // [I, F, Name]

    expect(get_archetype_ids_for_types(storage, [I])).toEqual([0, 1, 2, 3]);
    expect(get_archetype_ids_for_types(storage, [F, I])).toEqual([1, 3]);
    expect(get_archetype_ids_for_types(storage, [Name, I])).toEqual([2, 3]);
    expect(get_archetype_ids_for_types(storage, [I, F, Name])).toEqual([3]);
  });

  it("a type no archetype holds yields nothing", () => {
    const { storage, I, Tag } = setup();
    storage.add_component(e(0), I, 1);
    expect(get_archetype_ids_for_types(storage, [I, Tag])).toEqual([]);
    expect(get_archetype_ids_for_types(storage, [Tag])).toEqual([]);
  });

  it("duplicate types throw DUPLICATE_QUERY_COMPONENT", () => {
    const { storage, I, F } = setup();
    expect(
      error_category(() => get_archetype_ids_for_types(storage, [I, F, I])),
    ).toBe(ECS_ERROR.DUPLICATE_QUERY_COMPONENT);
  });

  it("no types throws EMPTY_QUERY", () => {
    const { storage } = setup();
    expect(error_category(() => get_archetype_ids_for_types(storage, []))).toBe(
      ECS_ERROR.EMPTY_QUERY,
    );
  });
});

describe("Query", () => {
  //=========================================================
  // Values
  //=========================================================

  it("yields tuples in the requested order", () => {
    const { storage, I, F } = setup();
    storage.add_component(e(0), I, 5);
    storage.add_component(e(0), F, 42);

    expect([...storage.query(I, F)]).toEqual([[5, 42]]);
    expect([...storage.query(F, I)]).toEqual([[42, 5]]);
  });

  it("yields nothing for a combination no entity has", () => {
    const { storage, I, F, Name } = setup();
    storage.add_component(e(0), I, 5);
    storage.add_component(e(1), F, 42);

    expect([...storage.query(I, F)]).toEqual([]);
    expect([...storage.query(Name)]).toEqual([]);
    expect(storage.query(Name).count()).toBe(0);
  });

  it("yields nothing on an empty storage", () => {
    const { storage, I } = setup();
    expect([...storage.query(I)]).toEqual([]);
  });

  it("rejects duplicate types at construction", () => {
    const { storage, I } = setup();
    expect(error_category(() => storage.query(I, I))).toBe(
      ECS_ERROR.DUPLICATE_QUERY_COMPONENT,
    );
  });

  it("rejects an empty type list", () => {
    const { storage } = setup();
    expect(error_category(() => new Query(storage, []))).toBe(
      ECS_ERROR.EMPTY_QUERY,
    );
  });

  it("walks matching archetypes in ascending id order", () => {
    const { storage, I, F, Name } = setup();
    storage.add_component(e(0), I, 1);
    storage.add_component(e(1), I, 2);
    storage.add_component(e(1), F, 0);
    storage.add_component(e(2), I, 3);
    storage.add_component(e(2), Name, "x");

    expect([...storage.query(I)]).toEqual([[1], [2], [3]]);
    expect(storage.query(I).archetypes.map((a) => a.id)).toEqual([0, 1, 2]);
    expect([...storage.query(I).entries()]).toEqual([
      [0, [1]],
      [1, [2]],
      [2, [3]],
    ]);
  });

  it("handles four types", () => {
    const { storage, I, F, Name, Tag } = setup();
    const tag = { kind: "enemy" };
    storage.add_component(e(0), Tag, tag);
    storage.add_component(e(0), Name, "orc");
    storage.add_component(e(0), F, 1.5);
    storage.add_component(e(0), I, 3);

    expect([...storage.query(Tag, I, Name, F)]).toEqual([
      [tag, 3, "orc", 1.5],
    ]);
    const [first] = [...storage.query(Tag, I, Name, F)];
    expect(first[0]).toBe(tag);
  });

  it("is evaluated when iterated, not when created", () => {
    const { storage, I } = setup();
    const q = storage.query(I);
    expect(q.count()).toBe(0);

    storage.add_component(e(0), I, 5);
    storage.add_component(e(1), I, 6);

    expect(q.count()).toBe(2);
    expect([...q]).toEqual([[5], [6]]);
  });

  it("archetypes and count include emptied archetypes", () => {
    const { storage, I, F } = setup();
    storage.add_component(e(0), I, 1);
    storage.add_component(e(0), F, 1);
    storage.remove_component(e(0), F);

    const q = storage.query(I);
    expect(q.archetypes.map((a) => a.entity_count)).toEqual([1, 0]);
    expect(q.count()).toBe(1);
  });

  //=========================================================
  // Mutable iteration
  //=========================================================

  it("iter_mut writes through, and a reversed re-query sees the writes", () => {
    const { storage, I, F } = setup();
    storage.add_component(e(0), I, 1);
    storage.add_component(e(0), F, 1.5);
    storage.add_component(e(1), I, 2);
    storage.add_component(e(1), F, 2.5);

    let visited = 0;
    for (const [i, f] of storage.query(I, F).iter_mut()) {
      i.value = i.value * 10;
      f.value = f.value + 1;
      visited++;
    }

    expect(visited).toBe(2);
    expect([...storage.query(F, I)]).toEqual([
      [2.5, 10],
      [3.5, 20],
    ]);
  });

  it("iter_mut can replace object values", () => {
    const { storage, Name } = setup();
    storage.add_component(e(0), Name, "a");
    storage.add_component(e(1), Name, "b");

    for (const [name] of storage.query(Name).iter_mut()) {
      name.value = name.value.toUpperCase();
    }

    expect(storage.get_component(e(0), Name)).toBe("A");
    expect(storage.get_component(e(1), Name)).toBe("B");
  });

  //=========================================================
  // Batch iteration
  //=========================================================

  it("each passes columns in requested order plus the row count", () => {
    const { storage, I, F } = setup();
    storage.add_component(e(0), I, 1);
    storage.add_component(e(0), F, 0.5);
    storage.add_component(e(1), I, 2);
    storage.add_component(e(1), F, 1.5);
    storage.add_component(e(2), I, 3);

    const counts: number[] = [];
    storage.query(F, I).each((f, i, n) => {
      counts.push(n);
      for (let row = 0; row < n; row++) f.set(row, f.get(row) + i.get(row));
    });

    expect(counts).toEqual([2]);
    expect(storage.get_component(e(0), F)).toBe(1.5);
    expect(storage.get_component(e(1), F)).toBe(3.5);
    expect(storage.get_component(e(2), I)).toBe(3);
  });

  it("each skips empty archetypes", () => {
    const { storage, I, F } = setup();
    storage.add_component(e(0), I, 1);
    storage.add_component(e(0), F, 1);

    let calls = 0;
    storage.query(I).each(() => {
      calls++;
    });
    expect(calls).toBe(1);
  });
});
