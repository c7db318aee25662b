import { z } from "zod";
import type { RelatedObject } from "./related-object.js";
import { Relation } from "./relation.js";
import { RelationType } from "./relation-type.js";
import type { Modifier } from "./types.js";

export type Clock = () => number;

export interface TimerOptions {
  modifiers?: readonly Modifier[];
  /** Source of the current time in milliseconds */
  clock?: Clock;
}

/**
 * A relation whose stored value is a start time and whose visible value is
 * the time elapsed since then.
 */
class TimerRelation extends Relation<number> {
  constructor(
    type: RelationType<number>,
    start: number,
    private readonly clock: Clock,
  ) {
    super(type, start);
  }

  override getTarget(): number {
    return this.clock() - super.getTarget();
  }
}

/**
 * A relation type that measures the time since its relation was created.
 * Reading the relation for the first time starts the timer. Setting a
 * value restarts it from that timestamp unless the type is FINAL.
 */
export class TimerType extends RelationType<number> {
  private readonly clock: Clock;

  constructor(name: string, options: TimerOptions = {}) {
    const clock = options.clock ?? Date.now;

    super(name, z.number(), { modifiers: options.modifiers, initialValue: () => clock() });
    this.clock = clock;
  }

  override bindRelation(_host: RelatedObject, relation: Relation<number>): Relation<number> {
    return new TimerRelation(this, relation.getTarget(), this.clock);
  }
}
