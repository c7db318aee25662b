import { z } from "zod";
import { AutomaticType } from "./automatic-type.js";
import type { RelationEvent } from "./event.js";
import type { Modifier } from "./types.js";

export type CounterPredicate = (event: RelationEvent<unknown>) => boolean;

export interface CounterOptions {
  modifiers?: readonly Modifier[];
}

/**
 * A reactive type that counts the relation events matching a predicate.
 * Where the events come from depends on the object the counter is set on:
 * an ordinary object counts changes of its relations, a relation counts
 * changes of its value, and a relation type counts changes of all relations
 * with that type.
 *
 * @example
 * ```typescript
 * const UPDATES = newIntCounter("UPDATES", (event) => event.type === EventType.UPDATE);
 *
 * item.set(UPDATES, 0);
 * item.set(NAME, "a");
 * item.set(NAME, "b");
 * item.get(UPDATES); // 1
 * ```
 */
export class CounterType<N extends number | bigint = number> extends AutomaticType<N> {
  constructor(
    name: string,
    initialValue: N,
    private readonly predicate: CounterPredicate,
    private readonly increment: (value: N) => N,
    options: CounterOptions = {},
  ) {
    super(
      name,
      z.custom<N>((value) => typeof value === typeof initialValue),
      { ...options, initialValue: () => initialValue },
    );
  }

  protected override processEvent(event: RelationEvent<unknown>): void {
    if (!this.predicate(event)) return;

    const counter = event.scope.getRelation(this);

    if (counter) {
      this.setRelationTarget(counter, this.increment(counter.getTarget()));
    }
  }
}

/** A number counter that starts at 0 and adds 1 per matching event. */
export function newIntCounter(
  name: string,
  predicate: CounterPredicate,
  options?: CounterOptions,
): CounterType<number> {
  return new CounterType<number>(name, 0, predicate, (value) => value + 1, options);
}
