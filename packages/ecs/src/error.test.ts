import assert from "node:assert";
import { describe, it } from "node:test";
import { InvalidArgument, InvalidState, LimitExceeded, assert as loomAssert, LoomError, NotFound } from "./error.js";

describe("Error", () => {
  describe("LoomError", () => {
    it("sets name to subclass name", () => {
      const error = new LimitExceeded({ resource: "Entity", max: 100 });

      assert.strictEqual(error.name, "LimitExceeded");
    });

    it("is instanceof Error and LoomError", () => {
      const error = new NotFound({ resource: "Entity", id: 42 });

      assert.ok(error instanceof Error);
      assert.ok(error instanceof LoomError);
      assert.ok(error instanceof NotFound);
    });

    it("supports cause chaining", () => {
      const cause = new Error("original");
      const error = new LoomError("wrapped", { cause });

      assert.strictEqual(error.cause, cause);
    });
  });

  describe("LimitExceeded", () => {
    it("constructs with resource and max", () => {
      const error = new LimitExceeded({ resource: "Entity", max: 1048575 });

      assert.strictEqual(error.resource, "Entity");
      assert.strictEqual(error.max, 1048575);
      assert.strictEqual(error.id, undefined);
      assert.strictEqual(error.message, "Entity limit exceeded: max 1048575");
    });

    it("includes id when provided", () => {
      const error = new LimitExceeded({ resource: "Entity", max: 1048575, id: 1048576 });

      assert.strictEqual(error.id, 1048576);
      assert.strictEqual(error.message, "Entity limit exceeded: max 1048575 (cannot allocate ID 1048576)");
    });
  });

  describe("NotFound", () => {
    it("constructs with resource and id", () => {
      const error = new NotFound({ resource: "Entity", id: 42 });

      assert.strictEqual(error.resource, "Entity");
      assert.strictEqual(error.id, 42);
      assert.strictEqual(error.context, undefined);
      assert.strictEqual(error.message, 'Entity "42" not found');
    });

    it("includes context when provided", () => {
      const error = new NotFound({ resource: "Entity", id: 7, context: "world" });

      assert.strictEqual(error.context, "world");
      assert.strictEqual(error.message, 'Entity "7" not found in world');
    });
  });

  describe("InvalidArgument", () => {
    it("constructs with expected only", () => {
      const error = new InvalidArgument({ expected: "non-empty system name" });

      assert.strictEqual(error.expected, "non-empty system name");
      assert.strictEqual(error.actual, undefined);
      assert.strictEqual(error.message, "Invalid argument: expected non-empty system name");
    });

    it("includes actual when provided", () => {
      const error = new InvalidArgument({ expected: "entity handle", actual: "string" });

      assert.strictEqual(error.actual, "string");
      assert.strictEqual(error.message, "Invalid argument: expected entity handle, got string");
    });
  });

  describe("InvalidState", () => {
    it("constructs with message", () => {
      const error = new InvalidState({ message: "Cannot start updating while world is syncing-entities" });

      assert.strictEqual(error.message, "Cannot start updating while world is syncing-entities");
    });
  });

  describe("assert", () => {
    it("passes on truthy condition", () => {
      assert.doesNotThrow(() => {
        loomAssert(true, LimitExceeded, { resource: "Entity", max: 100 });
        loomAssert(1, NotFound, { resource: "Entity", id: 1 });
        loomAssert({}, InvalidArgument, { expected: "anything" });
      });
    });

    it("throws correct error class on falsy condition", () => {
      assert.throws(() => loomAssert(false, LimitExceeded, { resource: "Entity", max: 100 }), LimitExceeded);
      assert.throws(() => loomAssert(0, NotFound, { resource: "Entity", id: 3 }), NotFound);
      assert.throws(() => loomAssert(undefined, InvalidArgument, { expected: "name" }), InvalidArgument);
      assert.throws(() => loomAssert("", InvalidState, { message: "bad state" }), InvalidState);
    });

    it("constructs error with correct params", () => {
      try {
        loomAssert(false, LimitExceeded, { resource: "Entity", max: 256, id: 257 });
        assert.fail("should have thrown");
      } catch (error) {
        assert.ok(error instanceof LimitExceeded);
        assert.strictEqual(error.resource, "Entity");
        assert.strictEqual(error.max, 256);
        assert.strictEqual(error.id, 257);
      }
    });
  });
});
