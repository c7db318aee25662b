import { describe, it } from "node:test";
import assert from "node:assert";
import { EventType, INFO, ListenerType, NAME, RelatedObject, RelationEvent } from "../src/index.js";
import { assertRelationError } from "./helpers.js";

type ChangeHandler = (change: string) => void;

const HANDLERS = new ListenerType<ChangeHandler>("listener.HANDLERS", (handler, event) =>
  handler(`${event.type} ${event.relation.type.name}`),
);
const UNDISPATCHED = new ListenerType<ChangeHandler>("listener.UNDISPATCHED");

describe("ListenerType", () => {
  it("should forward relation events to registered listeners", () => {
    const obj = new RelatedObject();
    const changes: string[] = [];

    HANDLERS.addListener(obj, (change) => changes.push(`first ${change}`));
    HANDLERS.addListener(obj, (change) => changes.push(`second ${change}`));
    obj.set(INFO, "info");

    assert.deepStrictEqual(changes, ["first ADD INFO", "second ADD INFO"]);
    assert.strictEqual(obj.get(HANDLERS)?.length, 2);
  });

  it("should stop forwarding to removed listeners", () => {
    const obj = new RelatedObject();
    const changes: string[] = [];
    const handler: ChangeHandler = (change) => changes.push(change);

    HANDLERS.addListener(obj, handler);
    obj.set(INFO, "first");

    assert.strictEqual(HANDLERS.removeListener(obj, handler), true);
    assert.strictEqual(HANDLERS.removeListener(obj, handler), false);

    obj.set(INFO, "second");

    assert.deepStrictEqual(changes, ["ADD INFO"]);
  });

  it("should allow listeners to remove themselves while notified", () => {
    const obj = new RelatedObject();
    const changes: string[] = [];
    const once: ChangeHandler = (change) => {
      changes.push(`once ${change}`);
      HANDLERS.removeListener(obj, once);
    };

    HANDLERS.addListener(obj, once);
    HANDLERS.addListener(obj, (change) => changes.push(`always ${change}`));
    obj.set(INFO, "first");
    obj.set(INFO, "second");

    assert.deepStrictEqual(changes, ["once ADD INFO", "always ADD INFO", "always UPDATE INFO"]);
  });

  it("should propagate listener errors to the caller", () => {
    const obj = new RelatedObject();
    HANDLERS.addListener(obj, () => {
      throw new Error("listener failed");
    });

    assert.throws(() => obj.set(NAME, "name"), /listener failed/);
    assert.strictEqual(obj.hasRelation(NAME), false);
  });

  it("should notify listeners explicitly", () => {
    const obj = new RelatedObject();
    const target = new RelatedObject();
    const relation = target.set(NAME, "name");
    const changes: string[] = [];

    HANDLERS.addListener(obj, (change) => changes.push(change));
    HANDLERS.notifyListeners(obj, new RelationEvent(EventType.UPDATE, target, relation, "other", target));

    assert.deepStrictEqual(changes, ["UPDATE NAME"]);
  });

  it("should fail without a dispatch function", () => {
    const obj = new RelatedObject();
    const changes: string[] = [];

    UNDISPATCHED.addListener(obj, (change) => changes.push(change));

    assertRelationError(
      () => obj.set(INFO, "info"),
      "UNSUPPORTED_DERIVATION",
      /No event dispatch defined for listener\.UNDISPATCHED/,
    );
    assert.strictEqual(obj.hasRelation(INFO), false);
    assert.deepStrictEqual(changes, []);
  });
});
