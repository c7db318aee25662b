import { describe, it } from "node:test";
import assert from "node:assert";
import {
  CounterType,
  EventType,
  Modifier,
  NAME,
  newIntCounter,
  newStringType,
  RelatedObject,
} from "../src/index.js";
import { assertRelationError } from "./helpers.js";

const LABEL = newStringType("counter.LABEL");
const DETAIL = newStringType("counter.DETAIL");
const CHANGES = newIntCounter("counter.CHANGES", () => true);
const FINAL_CHANGES = newIntCounter("counter.FINAL_CHANGES", () => true, {
  modifiers: [Modifier.FINAL],
});
const LABEL_CHANGES = newIntCounter(
  "counter.LABEL_CHANGES",
  (event) => event.type !== EventType.REMOVE && event.relation.type === LABEL,
);
const UPDATES = newIntCounter("counter.UPDATES", (event) => event.type === EventType.UPDATE);
const BIG_CHANGES = new CounterType<bigint>("counter.BIG_CHANGES", 0n, () => true, (value) => value + 1n);

describe("CounterType", () => {
  it("should count the changes of other relations", () => {
    const obj = new RelatedObject();

    assert.strictEqual(obj.get(CHANGES), 0);

    obj.set(DETAIL, "first");
    obj.set(DETAIL, "second");
    obj.deleteRelation(DETAIL);

    assert.strictEqual(obj.get(CHANGES), 3);
  });

  it("should only count events matching the predicate", () => {
    const obj = new RelatedObject();
    obj.get(LABEL_CHANGES);

    obj.set(DETAIL, "info");
    assert.strictEqual(obj.get(LABEL_CHANGES), 0);

    obj.set(LABEL, "name");
    assert.strictEqual(obj.get(LABEL_CHANGES), 1);

    obj.deleteRelation(LABEL);
    assert.strictEqual(obj.get(LABEL_CHANGES), 1);
  });

  it("should count updates only", () => {
    const obj = new RelatedObject();
    obj.get(UPDATES);

    obj.set(DETAIL, "a");
    obj.set(DETAIL, "b");
    obj.set(DETAIL, "c");
    obj.set(DETAIL, "d");

    assert.strictEqual(obj.get(UPDATES), 3);
  });

  it("should keep counting a final counter but reject external updates", () => {
    const obj = new RelatedObject();

    obj.set(FINAL_CHANGES, 5);
    assert.strictEqual(obj.get(FINAL_CHANGES), 5);

    obj.set(DETAIL, "info");
    assert.strictEqual(obj.get(FINAL_CHANGES), 6);

    assertRelationError(() => obj.set(FINAL_CHANGES, 0), "ILLEGAL_MUTATION");
    assert.strictEqual(obj.get(FINAL_CHANGES), 6);
  });

  it("should count bigint values", () => {
    const obj = new RelatedObject();

    assert.strictEqual(obj.get(BIG_CHANGES), 0n);

    obj.set(DETAIL, "info");

    assert.strictEqual(obj.get(BIG_CHANGES), 1n);
  });

  it("should stop counting when the counter relation is deleted", () => {
    const obj = new RelatedObject();
    obj.get(CHANGES);
    obj.set(DETAIL, "first");

    assert.strictEqual(obj.deleteRelation(CHANGES), true);

    obj.set(DETAIL, "second");

    assert.strictEqual(obj.hasRelation(CHANGES), false);
    assert.strictEqual(obj.findListeners("relation")?.size, 0);
  });

  it("should count in the scope of objects, relations and relation types", () => {
    const obj = new RelatedObject();

    assert.strictEqual(obj.get(CHANGES), 0);
    obj.set(LABEL, "Test1");

    const labelRelation = obj.getRelation(LABEL);
    assert.ok(labelRelation);
    labelRelation.set(CHANGES, 100);
    LABEL.set(CHANGES, 200);

    assert.strictEqual(obj.get(CHANGES), 1);

    obj.set(LABEL, "Test2");
    assert.strictEqual(obj.get(CHANGES), 2);
    assert.strictEqual(labelRelation.get(CHANGES), 101);
    assert.strictEqual(LABEL.get(CHANGES), 201);

    obj.set(DETAIL, "Test3");
    assert.strictEqual(obj.get(CHANGES), 3);
    assert.strictEqual(labelRelation.get(CHANGES), 101);
    assert.strictEqual(LABEL.get(CHANGES), 201);

    obj.deleteRelation(LABEL);
    assert.strictEqual(obj.get(CHANGES), 4);

    obj.set(CHANGES, 0);
    assert.strictEqual(obj.get(CHANGES), 0);

    obj.set(LABEL, "Test4");
    assert.strictEqual(obj.get(CHANGES), 1);
    assert.strictEqual(NAME.hasRelation(CHANGES), false);
  });
});
