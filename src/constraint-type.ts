import { AutomaticType } from "./automatic-type.js";
import { ConstraintViolation } from "./errors.js";
import type { RelationEvent } from "./event.js";
import type { RelatedObject } from "./related-object.js";
import { EventType, type ListenerScope, type Modifier, type Schema } from "./types.js";

export interface ConstraintOptions {
  modifiers?: readonly Modifier[];
}

/**
 * A relation type whose values must satisfy a predicate. Every value set
 * for a relation of this type is checked before it is stored; a rejected
 * value leaves the previous one in place.
 *
 * @example
 * ```typescript
 * const AGE = new ConstraintType("AGE", z.number(), (age) => age >= 0);
 *
 * person.set(AGE, 42);
 * person.set(AGE, -1); // throws ConstraintViolation
 * ```
 */
export class ConstraintType<T> extends AutomaticType<T> {
  constructor(
    name: string,
    datatype: Schema<T>,
    private readonly predicate: (value: T) => boolean,
    options: ConstraintOptions = {},
  ) {
    super(name, datatype, options);
  }

  protected override isRelevant(event: RelationEvent<unknown>): boolean {
    return event.relation.type === this;
  }

  protected override getListenerScope(_host: RelatedObject): ListenerScope {
    return "relation";
  }

  protected override processEvent(event: RelationEvent<unknown>): void {
    if (event.type === EventType.REMOVE) return;

    const value = event.value;

    if (!this.isValidTarget(value) || !this.predicate(value)) {
      throw new ConstraintViolation(
        `Constraint violated by ${this.name}: ${String(value)}`,
        { relationType: this.name },
      );
    }
  }
}
