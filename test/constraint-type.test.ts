import { describe, it } from "node:test";
import assert from "node:assert";
import { z } from "zod";
import { ConstraintType, INFO, RelatedObject } from "../src/index.js";
import { assertRelationError, recordEvents } from "./helpers.js";

const POSITIVE = new ConstraintType("constraint.POSITIVE", z.number(), (value) => value > 0);
const CODE = new ConstraintType("constraint.CODE", z.string(), (value) => /^[A-Z]{3}$/.test(value));

describe("ConstraintType", () => {
  it("should accept values that satisfy the predicate", () => {
    const obj = new RelatedObject();

    obj.set(POSITIVE, 5);

    assert.strictEqual(obj.get(POSITIVE), 5);
  });

  it("should reject updates that violate the predicate and keep the previous value", () => {
    const obj = new RelatedObject();
    obj.set(POSITIVE, 5);

    assertRelationError(
      () => obj.set(POSITIVE, -1),
      "CONSTRAINT_VIOLATION",
      /^Constraint violated by constraint\.POSITIVE: -1$/,
    );
    assert.strictEqual(obj.get(POSITIVE), 5);
  });

  it("should reject an invalid first value without adding the relation", () => {
    const obj = new RelatedObject();

    assertRelationError(() => obj.set(CODE, "abc"), "CONSTRAINT_VIOLATION");
    assert.strictEqual(obj.hasRelation(CODE), false);
    assert.strictEqual(obj.findListeners("relation")?.size, 0);

    obj.set(CODE, "ABC");

    assert.strictEqual(obj.get(CODE), "ABC");
  });

  it("should not notify other listeners of rejected values", () => {
    const obj = new RelatedObject();
    obj.set(POSITIVE, 1);
    const { events, listener } = recordEvents();
    obj.addRelationListener(listener);

    assert.throws(() => obj.set(POSITIVE, 0));
    obj.set(POSITIVE, 2);

    assert.deepStrictEqual(events, ["UPDATE constraint.POSITIVE=2"]);
  });

  it("should ignore changes of other relations", () => {
    const obj = new RelatedObject();
    obj.set(POSITIVE, 1);

    obj.set(INFO, "unrelated");

    assert.strictEqual(obj.get(INFO), "unrelated");
  });

  it("should allow constrained relations to be deleted", () => {
    const obj = new RelatedObject();
    obj.set(POSITIVE, 1);

    assert.strictEqual(obj.deleteRelation(POSITIVE), true);
    assert.strictEqual(obj.hasRelation(POSITIVE), false);
  });

  it("should constrain annotations of relations", () => {
    const obj = new RelatedObject();
    const relation = obj.set(INFO, "annotated");

    relation.set(POSITIVE, 3);

    assertRelationError(() => relation.set(POSITIVE, -3), "CONSTRAINT_VIOLATION");
    assert.strictEqual(relation.get(POSITIVE), 3);
  });
});
