import assert from "node:assert";
import { describe, it } from "node:test";
import { createAspect } from "./aspect.js";
import { getComponent, setComponent } from "./component.js";
import type { Entity } from "./encoding.js";
import { createEntity } from "./entity.js";
import { dequeue, enqueue } from "./queue.js";
import { setSystemActive, update, updateSystem } from "./scheduler.js";
import { defineSystem } from "./system.js";
import { syncEntities } from "./sync.js";
import { createWorld, getSystemEntities, isSystemActive } from "./world.js";

describe("Scheduler", () => {
  describe("Frame Execution", () => {
    it("updates systems in registration order", () => {
      const order: string[] = [];
      const first = defineSystem({ name: "first", preupdate: () => order.push("first") });
      const second = defineSystem({ name: "second", preupdate: () => order.push("second") });
      const world = createWorld(second, first);

      update(world, 0);

      assert.deepStrictEqual(order, ["second", "first"]);
    });

    it("passes dt to preupdate and update hooks", () => {
      const seen: string[] = [];
      const system = defineSystem({
        name: "timed",
        aspect: createAspect(["clock"]),
        preupdate: (dt) => seen.push(`pre:${dt}`),
        update: (_entity, dt) => seen.push(`update:${dt}`),
      });
      const world = createWorld(system, { clock: 0 });

      update(world, 0.5);

      assert.deepStrictEqual(seen, ["pre:0.5", "update:0.5"]);
    });

    it("runs preupdate once before the member updates", () => {
      const seen: string[] = [];
      const system = defineSystem({
        name: "batched",
        aspect: createAspect(["n"]),
        preupdate: () => seen.push("pre"),
        update: () => seen.push("update"),
      });
      const world = createWorld(system, { n: 1 }, { n: 2 }, { n: 3 });

      update(world, 0);

      assert.deepStrictEqual(seen, ["pre", "update", "update", "update"]);
    });

    it("moves components through an update hook", () => {
      const movement = defineSystem({
        name: "movement",
        aspect: createAspect(["x", "vx"]),
        update(entity, dt, world) {
          const x = getComponent(world, entity, "x");
          const vx = getComponent(world, entity, "vx");

          if (typeof x === "number" && typeof vx === "number") {
            setComponent(world, entity, "x", x + vx * dt);
          }
        },
      });
      const world = createWorld(movement);
      const entity = createEntity(world, { x: 1, vx: 2 });
      enqueue(world, entity);

      update(world, 0.5);
      update(world, 0.5);

      assert.strictEqual(getComponent(world, entity, "x"), 3);
    });

    it("counts frames", () => {
      const world = createWorld();

      update(world, 0);
      update(world, 0);

      assert.strictEqual(world.execution.frame, 2);
    });

    it("skips hooks that were not supplied", () => {
      const world = createWorld(defineSystem({ name: "bare", aspect: createAspect(["a"]) }), { a: 1 });

      assert.doesNotThrow(() => update(world, 0));
    });
  });

  describe("System Activation", () => {
    it("skips inactive systems but keeps their membership current", () => {
      const updated: Entity[] = [];
      const s1 = defineSystem({
        name: "s1",
        aspect: createAspect(["pos"]),
        update: (entity) => updated.push(entity),
      });
      const world = createWorld(s1);
      const entity = createEntity(world, { pos: 1 });

      setSystemActive(world, s1, false);
      enqueue(world, entity);
      update(world, 1);

      assert.deepStrictEqual(updated, []);
      assert.strictEqual(isSystemActive(world, s1), false);
      assert.deepStrictEqual(getSystemEntities(world, s1), new Set([entity]));

      setSystemActive(world, s1, true);
      update(world, 1);

      assert.deepStrictEqual(updated, [entity]);
    });

    it("ignores systems that are not registered", () => {
      const world = createWorld();
      const system = defineSystem({ name: "stray" });

      setSystemActive(world, system, true);

      assert.strictEqual(isSystemActive(world, system), false);
      assert.strictEqual(world.systems.active.has(system), false);
    });

    it("starts registered systems active", () => {
      const system = defineSystem({ name: "fresh" });
      const world = createWorld(system);

      assert.strictEqual(isSystemActive(world, system), true);
    });
  });

  describe("Manual Update", () => {
    it("drives an inactive system by hand", () => {
      const updated: Entity[] = [];
      const overlay = defineSystem({
        name: "overlay",
        aspect: createAspect(["debug"]),
        update: (entity) => updated.push(entity),
      });
      const world = createWorld(overlay, { debug: true });
      setSystemActive(world, overlay, false);
      update(world, 0);

      updateSystem(world, overlay, 0);

      assert.deepStrictEqual(updated, [...getSystemEntities(world, overlay)]);
      assert.strictEqual(updated.length, 1);
    });

    it("runs only preupdate for an unregistered system", () => {
      const seen: string[] = [];
      const world = createWorld({ a: 1 });
      const system = defineSystem({
        name: "detached",
        aspect: createAspect(["a"]),
        preupdate: () => seen.push("pre"),
        update: () => seen.push("update"),
      });

      updateSystem(world, system, 0);

      assert.deepStrictEqual(seen, ["pre"]);
    });

    it("may sync from a hook when called outside update", () => {
      const visited: Entity[] = [];
      const ticker = defineSystem({
        name: "ticker",
        aspect: createAspect(["tick"]),
        update(entity, _dt, w) {
          visited.push(entity);
          dequeue(w, entity);
          syncEntities(w);
        },
      });
      const world = createWorld(ticker, { tick: 1 }, { tick: 2 });

      updateSystem(world, ticker, 0);

      assert.strictEqual(visited.length, 2);
      assert.strictEqual(getSystemEntities(world, ticker).size, 0);
    });
  });
});
