import { ImmutableViolation } from "./errors.js";
import type { RelatedObject } from "./related-object.js";
import type { Relation } from "./relation.js";
import { EventType, type RelationListener } from "./types.js";

/**
 * A change of a single relation. Update events are raised before the new
 * value is stored, so `relation.getTarget()` still returns the previous
 * value and `updateValue` holds the proposed one.
 */
export class RelationEvent<T> {
  constructor(
    readonly type: EventType,
    /** The host on which the relation changed */
    readonly source: RelatedObject,
    readonly relation: Relation<T>,
    readonly updateValue: T | undefined,
    /**
     * The object whose listener list delivered this event: the source
     * itself, the changed relation, or its relation type.
     */
    readonly scope: RelatedObject,
  ) {}

  /** The proposed value for updates, the relation's value otherwise. */
  get value(): T | undefined {
    return this.type === EventType.UPDATE ? this.updateValue : this.relation.getTarget();
  }

  toString(): string {
    return `RelationEvent[${this.type} ${this.relation.type.name}]`;
  }
}

/**
 * Ordered list of relation listeners. Listeners are invoked synchronously
 * in registration order; an exception aborts the remaining dispatch.
 */
export class EventDispatcher {
  private readonly listeners: RelationListener[] = [];
  private immutable = false;

  add(listener: RelationListener): void {
    this.checkMutable();
    this.listeners.push(listener);
  }

  remove(listener: RelationListener): boolean {
    this.checkMutable();
    const index = this.listeners.indexOf(listener);
    if (index < 0) return false;
    this.listeners.splice(index, 1);
    return true;
  }

  has(listener: RelationListener): boolean {
    return this.listeners.includes(listener);
  }

  get size(): number {
    return this.listeners.length;
  }

  isImmutable(): boolean {
    return this.immutable;
  }

  /** Prevents any further registration changes. */
  setImmutable(): void {
    this.immutable = true;
  }

  dispatch(event: RelationEvent<unknown>): void {
    // Listeners may (de)register others while handling the event
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }

  private checkMutable(): void {
    if (this.immutable) {
      throw new ImmutableViolation("Listeners of an immutable object cannot be changed");
    }
  }
}
