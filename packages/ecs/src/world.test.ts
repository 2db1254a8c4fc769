import assert from "node:assert";
import { describe, it } from "node:test";
import { createAspect } from "./aspect.js";
import { getComponent } from "./component.js";
import type { Entity } from "./encoding.js";
import { createEntity } from "./entity.js";
import { registerObserverCallback } from "./observer.js";
import { dequeue, enqueue } from "./queue.js";
import { update } from "./scheduler.js";
import { defineSystem } from "./system.js";
import {
  createWorld,
  getEntities,
  getEntityCount,
  getSystemCount,
  getSystemEntities,
  getSystems,
  hasSystem,
  isEntityResident,
} from "./world.js";

describe("World", () => {
  describe("World Creation", () => {
    it("starts empty and idle", () => {
      const world = createWorld();

      assert.strictEqual(getEntityCount(world), 0);
      assert.strictEqual(getSystemCount(world), 0);
      assert.strictEqual(world.execution.phase, "idle");
      assert.strictEqual(world.execution.frame, 0);
    });

    it("registers initial systems in order", () => {
      const physics = defineSystem({ name: "physics" });
      const render = defineSystem({ name: "render" });

      const world = createWorld(physics, render);

      assert.deepStrictEqual(getSystems(world), [physics, render]);
      assert.strictEqual(hasSystem(world, physics), true);
    });

    it("creates resident entities from component records", () => {
      const render = defineSystem({ name: "render", aspect: createAspect(["sprite"]) });

      const world = createWorld(render, { sprite: "hero" }, { sound: "step" });

      assert.strictEqual(getEntityCount(world), 2);

      const [hero] = getSystemEntities(world, render);
      assert.ok(hero !== undefined);
      assert.strictEqual(getComponent(world, hero, "sprite"), "hero");
    });

    it("fires onAdd for entities created with the world", () => {
      const added: Entity[] = [];
      const render = defineSystem({
        name: "render",
        aspect: createAspect(["sprite"]),
        onAdd: (entity) => added.push(entity),
      });

      const world = createWorld({ sprite: "a" }, render, { sprite: "b" });

      assert.strictEqual(added.length, 2);
      assert.deepStrictEqual(new Set(added), getSystemEntities(world, render));
    });

    it("leaves nothing pending", () => {
      const world = createWorld(defineSystem({ name: "s" }), { a: 1 });

      assert.strictEqual(world.commands.entities.size, 0);
      assert.deepStrictEqual(world.commands.addSystems, []);
      assert.deepStrictEqual(world.commands.removeSystems, []);
    });
  });

  describe("World Queries", () => {
    it("counts resident entities, not allocated ones", () => {
      const world = createWorld();
      const resident = createEntity(world);
      createEntity(world);
      enqueue(world, resident);
      update(world, 0);

      assert.strictEqual(getEntityCount(world), 1);
      assert.deepStrictEqual([...getEntities(world)], [resident]);
    });

    it("tracks counts through adds and removes", () => {
      const a = defineSystem({ name: "a" });
      const world = createWorld(a, { x: 1 }, { x: 2 });
      const [first] = getEntities(world);
      assert.ok(first !== undefined);

      dequeue(world, first, a);
      update(world, 0);

      assert.strictEqual(getEntityCount(world), 1);
      assert.strictEqual(getSystemCount(world), 0);
      assert.strictEqual(isEntityResident(world, first), false);
      assert.strictEqual(hasSystem(world, a), false);
    });

    it("returns an empty membership for unregistered systems", () => {
      const world = createWorld();

      assert.strictEqual(getSystemEntities(world, defineSystem({ name: "none" })).size, 0);
    });
  });

  describe("Isolation", () => {
    it("keeps worlds independent", () => {
      const shared = defineSystem({ name: "shared", aspect: createAspect(["a"]) });
      const left = createWorld(shared, { a: 1 });
      const right = createWorld(shared);
      const events: string[] = [];
      registerObserverCallback(right, "entityAdded", () => events.push("right"));

      update(left, 0);

      assert.strictEqual(getSystemEntities(left, shared).size, 1);
      assert.strictEqual(getSystemEntities(right, shared).size, 0);
      assert.deepStrictEqual(events, []);
    });
  });
});
