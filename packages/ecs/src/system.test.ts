import assert from "node:assert";
import { describe, it } from "node:test";
import { createAspect, EMPTY_ASPECT } from "./aspect.js";
import { InvalidArgument } from "./error.js";
import { defineSystem, isSystem, SYSTEM_KIND } from "./system.js";

describe("System", () => {
  describe("System Definition", () => {
    it("stores name, aspect and hooks", () => {
      const aspect = createAspect(["position"]);
      const update = () => {};
      const onAdd = () => {};

      const system = defineSystem({ name: "movement", aspect, update, onAdd });

      assert.strictEqual(system.kind, SYSTEM_KIND);
      assert.strictEqual(system.name, "movement");
      assert.strictEqual(system.aspect, aspect);
      assert.strictEqual(system.update, update);
      assert.strictEqual(system.onAdd, onAdd);
      assert.strictEqual(system.preupdate, undefined);
      assert.strictEqual(system.onRemove, undefined);
    });

    it("defaults to the empty aspect", () => {
      const system = defineSystem({ name: "idle" });

      assert.strictEqual(system.aspect, EMPTY_ASPECT);
    });

    it("allows systems to share an aspect", () => {
      const aspect = createAspect(["position"]);

      const a = defineSystem({ name: "a", aspect });
      const b = defineSystem({ name: "b", aspect });

      assert.strictEqual(a.aspect, b.aspect);
      assert.notStrictEqual(a, b);
    });

    it("rejects an empty name", () => {
      assert.throws(() => defineSystem({ name: "" }), InvalidArgument);
    });

    it("freezes the system", () => {
      const system = defineSystem({ name: "frozen" });

      assert.ok(Object.isFrozen(system));
    });
  });

  describe("Kind Test", () => {
    it("recognizes defined systems", () => {
      assert.strictEqual(isSystem(defineSystem({ name: "render" })), true);
    });

    it("rejects look-alikes and other values", () => {
      assert.strictEqual(isSystem({ kind: SYSTEM_KIND, name: "fake", aspect: EMPTY_ASPECT }), false);
      assert.strictEqual(isSystem(42), false);
      assert.strictEqual(isSystem(null), false);
      assert.strictEqual(isSystem(undefined), false);
    });
  });
});
