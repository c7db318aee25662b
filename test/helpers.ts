import assert from "node:assert";
import { RelationError, type RelationErrorCode, type RelationEvent } from "../src/index.js";

/**
 * Assert that a call fails with a relation error of the given code
 */
export function assertRelationError(fn: () => unknown, code: RelationErrorCode, message?: RegExp) {
  assert.throws(fn, (error: unknown) => {
    assert.ok(error instanceof RelationError, `Expected a RelationError, got ${String(error)}`);
    assert.strictEqual(error.code, code);
    if (message) {
      assert.match(error.message, message);
    }
    return true;
  });
}

/**
 * Listener that records events as "TYPE NAME=value" strings
 */
export function recordEvents(): { events: string[]; listener: (event: RelationEvent<unknown>) => void } {
  const events: string[] = [];
  return {
    events,
    listener: (event) => {
      events.push(`${event.type} ${event.relation.type.name}=${String(event.value)}`);
    },
  };
}
