import { describe, it } from "node:test";
import assert from "node:assert";
import { ImmutableViolation, isReadonlyView, readonlyView } from "../src/index.js";
import { assertRelationError } from "./helpers.js";

describe("readonlyView", () => {
  describe("arrays", () => {
    it("should allow reading", () => {
      const view = readonlyView([1, 2, 3]);

      assert.strictEqual(view.length, 3);
      assert.strictEqual(view[1], 2);
      assert.deepStrictEqual(
        view.map((value) => value * 2),
        [2, 4, 6],
      );
      assert.strictEqual(view.includes(3), true);
    });

    it("should reject mutations", () => {
      const view = readonlyView(["a", "b"]);

      assertRelationError(() => view.push("c"), "IMMUTABLE_VIOLATION");
      assertRelationError(() => view.reverse(), "IMMUTABLE_VIOLATION");
      assertRelationError(
        () => {
          view[0] = "z";
        },
        "IMMUTABLE_VIOLATION",
        /^Cannot set '0' of an unmodifiable collection$/,
      );
      assertRelationError(() => view.pop(), "IMMUTABLE_VIOLATION");
      assert.deepStrictEqual([...view], ["a", "b"]);
    });

    it("should reflect changes of the original", () => {
      const original = ["a"];
      const view = readonlyView(original);

      original.push("b");

      assert.deepStrictEqual([...view], ["a", "b"]);
    });
  });

  describe("sets and maps", () => {
    it("should allow reading a set", () => {
      const view = readonlyView(new Set(["x", "y"]));

      assert.strictEqual(view.size, 2);
      assert.strictEqual(view.has("x"), true);
      assert.deepStrictEqual([...view.values()], ["x", "y"]);
    });

    it("should reject set mutations", () => {
      const view = readonlyView(new Set(["x"]));

      assert.throws(() => view.add("y"), ImmutableViolation);
      assert.throws(() => view.delete("x"), ImmutableViolation);
      assert.throws(() => view.clear(), /^ImmutableViolation: Cannot call 'clear' of an unmodifiable collection$/);
      assert.strictEqual(view.size, 1);
    });

    it("should allow reading a map and reject mutations", () => {
      const view = readonlyView(new Map([["one", 1]]));

      assert.strictEqual(view.get("one"), 1);
      assert.deepStrictEqual([...view.keys()], ["one"]);
      assertRelationError(() => view.set("two", 2), "IMMUTABLE_VIOLATION");
      assert.strictEqual(view.has("two"), false);
    });
  });

  it("should identify views", () => {
    const original = [1];
    const view = readonlyView(original);

    assert.strictEqual(isReadonlyView(view), true);
    assert.strictEqual(isReadonlyView(original), false);
    assert.strictEqual(isReadonlyView(null), false);
    assert.strictEqual(readonlyView(view), view);
  });
});
