import assert from "node:assert";
import { describe, it } from "node:test";
import { createAspect } from "./aspect.js";
import type { Entity } from "./encoding.js";
import { createEntity, destroyEntity } from "./entity.js";
import { fireObserverEvent, registerObserverCallback, unregisterObserverCallback } from "./observer.js";
import { dequeue, enqueue } from "./queue.js";
import { update } from "./scheduler.js";
import type { System } from "./system.js";
import { defineSystem } from "./system.js";
import { syncSystems } from "./sync.js";
import { createWorld } from "./world.js";

describe("Observer", () => {
  describe("Registration", () => {
    it("invokes callbacks in reverse registration order", () => {
      const world = createWorld();
      const entity = createEntity(world);
      const calls: string[] = [];

      registerObserverCallback(world, "entityAdded", () => calls.push("first"));
      registerObserverCallback(world, "entityAdded", () => calls.push("second"));

      fireObserverEvent(world, "entityAdded", entity);

      assert.deepStrictEqual(calls, ["second", "first"]);
    });

    it("stops invoking unregistered callbacks", () => {
      const world = createWorld();
      const calls: Entity[] = [];
      const callback = (entity: Entity) => {
        calls.push(entity);
      };

      registerObserverCallback(world, "entityCreated", callback);
      const first = createEntity(world);
      unregisterObserverCallback(world, "entityCreated", callback);
      createEntity(world);

      assert.deepStrictEqual(calls, [first]);
    });

    it("ignores unregistering an unknown callback", () => {
      const world = createWorld();

      assert.doesNotThrow(() => unregisterObserverCallback(world, "entityAdded", () => {}));
    });

    it("lets a callback unregister itself during dispatch", () => {
      const world = createWorld();
      const entity = createEntity(world);
      const calls: string[] = [];
      const once = () => {
        calls.push("once");
        unregisterObserverCallback(world, "entityRemoved", once);
      };

      registerObserverCallback(world, "entityRemoved", () => calls.push("always"));
      registerObserverCallback(world, "entityRemoved", once);

      fireObserverEvent(world, "entityRemoved", entity);
      fireObserverEvent(world, "entityRemoved", entity);

      assert.deepStrictEqual(calls, ["once", "always", "always"]);
    });
  });

  describe("Lifecycle Events", () => {
    it("reports entity residency transitions once", () => {
      const world = createWorld();
      const entity = createEntity(world);
      const events: string[] = [];

      registerObserverCallback(world, "entityAdded", (e) => events.push(`added:${e}`));
      registerObserverCallback(world, "entityRemoved", (e) => events.push(`removed:${e}`));

      enqueue(world, entity);
      update(world, 0);
      enqueue(world, entity);
      update(world, 0);
      dequeue(world, entity);
      update(world, 0);
      dequeue(world, entity);
      update(world, 0);

      assert.deepStrictEqual(events, [`added:${entity}`, `removed:${entity}`]);
    });

    it("reports release after removal", () => {
      const world = createWorld();
      const entity = createEntity(world);
      const events: string[] = [];
      enqueue(world, entity);
      update(world, 0);

      registerObserverCallback(world, "entityRemoved", () => events.push("removed"));
      registerObserverCallback(world, "entityReleased", () => events.push("released"));

      destroyEntity(world, entity);
      update(world, 0);

      assert.deepStrictEqual(events, ["removed", "released"]);
    });

    it("reports system registration changes", () => {
      const world = createWorld();
      const system = defineSystem({ name: "render", aspect: createAspect(["sprite"]) });
      const added: System[] = [];
      const removed: System[] = [];

      registerObserverCallback(world, "systemAdded", (s) => added.push(s));
      registerObserverCallback(world, "systemRemoved", (s) => removed.push(s));

      enqueue(world, system);
      syncSystems(world);
      enqueue(world, system);
      syncSystems(world);
      dequeue(world, system);
      syncSystems(world);

      assert.deepStrictEqual(added, [system]);
      assert.deepStrictEqual(removed, [system]);
    });
  });
});
