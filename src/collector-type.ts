import { z } from "zod";
import { AutomaticType } from "./automatic-type.js";
import type { RelationEvent } from "./event.js";
import { MAXIMUM } from "./meta-types.js";
import type { RelatedObject } from "./related-object.js";
import type { Relation } from "./relation.js";
import type { RelationType } from "./relation-type.js";
import { EventType, type Modifier, type Schema } from "./types.js";
import { readonlyView } from "./view.js";

/**
 * Maps a changed relation to the value that should be collected. Returning
 * null or undefined skips the change.
 */
export type CollectFunction<T> = (type: RelationType<unknown>, value: unknown) => T | null | undefined;

export interface CollectorOptions {
  modifiers?: readonly Modifier[];
}

/**
 * A reactive type that collects values derived from relation events into a
 * list or a set. Lists keep every collected value in order of arrival, sets
 * keep distinct values and also drop a value again when the relation it
 * was collected from is removed.
 *
 * The size can be bounded with a MAXIMUM annotation on the collector type or
 * on the individual relation, in which case the oldest entries are dropped.
 *
 * FINAL and READONLY collectors expose an unmodifiable view of their
 * collection that still reflects new entries.
 */
export class CollectorType<T, C extends T[] | Set<T>> extends AutomaticType<C> {
  // Relation -> collection behind the view it exposes
  private readonly collections = new WeakMap<Relation<C>, C>();

  constructor(
    name: string,
    datatype: Schema<C>,
    private readonly collect: CollectFunction<T>,
    options: CollectorOptions = {},
  ) {
    super(name, datatype, options);
  }

  isDistinct(): boolean {
    return this.collectionKind() === "set";
  }

  protected override processEvent(event: RelationEvent<unknown>): void {
    const relation = event.scope.getRelation(this);
    if (!relation) return;

    const value = this.collect(event.relation.type, event.value);
    if (value === null || value === undefined) return;

    const collection: T[] | Set<T> = this.collections.get(relation) ?? relation.getTarget();

    if (collection instanceof Set) {
      if (event.type === EventType.REMOVE) {
        collection.delete(value);
      } else {
        collection.add(value);
      }
    } else if (event.type !== EventType.REMOVE) {
      collection.push(value);
    }

    this.trim(relation, collection);
  }

  protected override protectTarget(_host: RelatedObject, relation: Relation<C>): void {
    const collection = relation.getTarget();

    this.collections.set(relation, collection);
    this.setRelationTarget(relation, readonlyView(collection));
  }

  private trim(relation: Relation<C>, collection: T[] | Set<T>): void {
    const maximum = relation.getAnnotation(MAXIMUM);
    if (maximum === undefined) return;

    if (Array.isArray(collection)) {
      if (collection.length > maximum) {
        collection.splice(0, collection.length - maximum);
      }
      return;
    }

    // Sets iterate in insertion order, so the oldest entries come first
    for (const entry of collection) {
      if (collection.size <= maximum) break;
      collection.delete(entry);
    }
  }
}

/** A collector that keeps all collected values in a list. */
export function newCollector<T>(
  name: string,
  elementType: Schema<T>,
  collect: CollectFunction<T>,
  options?: CollectorOptions,
): CollectorType<T, T[]> {
  return new CollectorType<T, T[]>(name, z.array(elementType), collect, options);
}

/** A collector that keeps distinct collected values in a set. */
export function newDistinctCollector<T>(
  name: string,
  elementType: Schema<T>,
  collect: CollectFunction<T>,
  options?: CollectorOptions,
): CollectorType<T, Set<T>> {
  return new CollectorType<T, Set<T>>(name, z.set(elementType), collect, options);
}
