import { describe, expect, it } from "vitest";
import { World } from "../world";

describe("EntityBuilder", () => {
  it("attaches every component and returns the entity id", () => {
    const world = new World();
    const Name = world.register_component<string>("Name");
    const Health = world.register_numeric("i32", "Health");

    const player = world.build_entity().with(Name, "Player").with(Health, 100).build();

    expect(player).toBe(0);
    expect(world.storage.get_component(player, Name)).toBe("Player");
    expect(world.storage.get_component(player, Health)).toBe(100);
    expect(world.entity_count).toBe(1);
  });

  it("each with() attaches immediately", () => {
    const world = new World();
    const Name = world.register_component<string>("Name");

    const builder = world.build_entity();
    builder.with(Name, "half-built");

    expect(world.storage.get_component(builder.entity, Name)).toBe(
      "half-built",
    );
  });

  it("builders hand out consecutive ids", () => {
    const world = new World();
    const Name = world.register_component<string>();

    const a = world.build_entity().with(Name, "a").build();
    const b = world.build_entity().with(Name, "b").build();

    expect([a, b]).toEqual([0, 1]);
  });

  it("a repeated type keeps the first value", () => {
    const world = new World();
    const Health = world.register_numeric("i32");

    const e = world.build_entity().with(Health, 1).with(Health, 2).build();

    expect(world.storage.get_component(e, Health)).toBe(1);
  });
});
