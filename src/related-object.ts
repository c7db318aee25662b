import { EventDispatcher, RelationEvent } from "./event.js";
import { ATTACH_RELATION, RELATION_REMOVED, SET_TARGET } from "./internal.js";
import type { Relation } from "./relation.js";
import type { RelationType } from "./relation-type.js";
import {
  EventType,
  type ListenerScope,
  type RelationFilter,
  type RelationListener,
} from "./types.js";

/**
 * The capability of carrying relations. Implemented by RelatedObject; any
 * other object can obtain one through getRelatable().
 */
export interface Relatable {
  get<T>(type: RelationType<T>): T | undefined;
  getRelation<T>(type: RelationType<T>): Relation<T> | undefined;
  getRelations(filter?: RelationFilter): Relation<unknown>[];
  hasRelation(type: RelationType<unknown>): boolean;
  set<T>(type: RelationType<T>, value: T): Relation<T>;
  deleteRelation(type: RelationType<unknown>): boolean;
}

/**
 * Base class of all objects that carry relations, including relation types
 * and relations themselves. Instances can be used directly as generic
 * containers of relations.
 *
 * Mutations are synchronous. Listeners are notified before a change becomes
 * visible and may reject it by throwing; they may also mutate this or other
 * objects re-entrantly. There is no internal locking: concurrent mutation
 * of one object must be serialized by the caller.
 */
export class RelatedObject implements Relatable {
  // Created on first use, iteration follows insertion order
  private relations: Map<RelationType<unknown>, Relation<unknown>> | undefined;
  private listenerLists: Partial<Record<ListenerScope, EventDispatcher>> | undefined;

  /**
   * Returns the value of a relation. Without an existing relation the
   * type's default value is returned if it has one; otherwise the initial
   * value is stored as a new relation and returned. With a fallback argument
   * the fallback replaces both.
   */
  get<T>(type: RelationType<T>): T | undefined;
  get<T>(type: RelationType<T>, fallback: T): T;
  get<T>(type: RelationType<T>, ...fallback: [] | [T]): T | undefined {
    const relation = this.getRelation(type);

    if (relation) return relation.getTarget();
    if (fallback.length > 0) return fallback[0];
    if (type.hasDefaultValue()) return type.defaultValue(this);

    const initial = type.initialValue(this);

    // Immutable objects can still be read but no longer grow relations
    if (initial === undefined || this.isImmutable()) return initial;

    type.checkValidTarget(initial);

    return this.attachRelation(type.newRelation(this, initial)).getTarget();
  }

  getRelation<T>(type: RelationType<T>): Relation<T> | undefined {
    const relation = this.relations?.get(type);
    return relation && type.ownsRelation(relation) ? relation : undefined;
  }

  /**
   * All non-private relations of this object, optionally filtered.
   */
  getRelations(filter?: RelationFilter): Relation<unknown>[] {
    const result: Relation<unknown>[] = [];

    for (const relation of this.relations?.values() ?? []) {
      if (!relation.type.isPrivate() && (!filter || filter(relation))) {
        result.push(relation);
      }
    }

    return result;
  }

  getAll(filter?: RelationFilter): unknown[] {
    return this.getRelations(filter).map((relation) => relation.getTarget());
  }

  relationCount(filter?: RelationFilter): number {
    return this.getRelations(filter).length;
  }

  hasRelation(type: RelationType<unknown>): boolean {
    return this.relations?.has(type) ?? false;
  }

  hasFlag(type: RelationType<boolean>): boolean {
    return this.getRelation(type)?.getTarget() === true;
  }

  /**
   * Sets the value of a relation, creating it if necessary. Listeners see
   * the change before it is applied and can prevent it by throwing.
   */
  set<T>(type: RelationType<T>, value: T): Relation<T> {
    const relation = this.getRelation(type);

    if (relation) {
      this.updateRelation(relation, value);
      return relation;
    }

    type.checkReadonly();
    type.checkValidTarget(value);

    return this.attachRelation(type.newRelation(this, value));
  }

  setFlag(type: RelationType<boolean>): Relation<boolean> {
    return this.set(type, true);
  }

  /**
   * Removes the relation with the given type. Returns false if no such
   * relation exists.
   */
  deleteRelation(type: RelationType<unknown>): boolean {
    const relation = this.relations?.get(type);
    if (!relation) return false;

    type.checkUpdateAllowed();

    // Notify before removal so that listeners may prevent it
    this.notifyRelationListeners(EventType.REMOVE, relation, undefined);
    type.unbindRelation(this, relation);
    this.relations?.delete(type);
    relation[RELATION_REMOVED]();

    return true;
  }

  deleteRelations(filter?: RelationFilter): void {
    for (const relation of this.getRelations(filter)) {
      this.deleteRelation(relation.type);
    }
  }

  /**
   * Copies the non-private relations of this object to another one.
   * Relations the target already has are only overwritten with `replace`.
   */
  copyRelationsTo(target: RelatedObject, replace: boolean): void {
    for (const relation of this.getRelations()) {
      if (replace || !target.hasRelation(relation.type)) {
        target.set(relation.type, relation.getTarget());
      }
    }
  }

  addRelationListener(listener: RelationListener): void {
    this.getListeners("relation").add(listener);
  }

  removeRelationListener(listener: RelationListener): boolean {
    return this.findListeners("relation")?.remove(listener) ?? false;
  }

  /**
   * Returns one of this object's listener lists, creating it on first use.
   */
  getListeners(scope: ListenerScope): EventDispatcher {
    if (!this.listenerLists) {
      this.listenerLists = {};
    }

    let listeners = this.listenerLists[scope];
    if (!listeners) {
      listeners = new EventDispatcher();
      this.listenerLists[scope] = listeners;
    }

    return listeners;
  }

  findListeners(scope: ListenerScope): EventDispatcher | undefined {
    return this.listenerLists?.[scope];
  }

  /**
   * True once the IMMUTABLE flag has been set on this object.
   */
  isImmutable(): boolean {
    return this.findListeners("relation")?.isImmutable() ?? false;
  }

  toString(): string {
    return this.describe(new Set());
  }

  protected describe(visited: Set<object>): string {
    visited.add(this);

    const parts = this.getRelations().map((relation) => {
      const target = relation.getTarget();
      let text: string;

      if (target === this) {
        text = "<this>";
      } else if (target instanceof RelatedObject) {
        text = visited.has(target) ? target.constructor.name : target.describe(visited);
      } else {
        text = String(target);
      }

      return `${relation.type.name}=${text}`;
    });

    return `${this.constructor.name}[${parts.join(",")}]`;
  }

  /**
   * Adds a relation created elsewhere, such as an alias of another object's
   * relation. An existing relation with the same type is deleted first.
   */
  [ATTACH_RELATION]<T>(relation: Relation<T>): Relation<T> {
    relation.type.checkValidTarget(relation.getTarget());
    this.deleteRelation(relation.type);

    return this.attachRelation(relation);
  }

  private attachRelation<T>(relation: Relation<T>): Relation<T> {
    const type = relation.type;
    const added = type.bindRelation(this, relation);

    try {
      // Notify before adding so that listeners may prevent it
      this.notifyRelationListeners(EventType.ADD, added, undefined);
    } catch (error) {
      type.unbindRelation(this, added);
      throw error;
    }

    if (!this.relations) {
      this.relations = new Map();
    }
    this.relations.set(type, added);

    return added;
  }

  private updateRelation<T>(relation: Relation<T>, value: T): void {
    const type = relation.type;

    type.checkUpdateAllowed();
    type.checkValidTarget(value);
    relation.checkMutable();
    type.prepareRelationUpdate(this, relation, value);

    this.notifyRelationListeners(EventType.UPDATE, relation, value);
    relation[SET_TARGET](value);
  }

  /**
   * Dispatches a change to the listeners of this object, of the changed
   * relation, and of its relation type, in that order.
   */
  private notifyRelationListeners<T>(
    eventType: EventType,
    relation: Relation<T>,
    updateValue: T | undefined,
  ): void {
    const type = relation.type;

    if (type.isPrivate()) return;

    this.findListeners("relation")?.dispatch(
      new RelationEvent(eventType, this, relation, updateValue, this),
    );
    relation
      .findListeners("update")
      ?.dispatch(new RelationEvent(eventType, this, relation, updateValue, relation));
    type
      .findListeners("type")
      ?.dispatch(new RelationEvent(eventType, this, relation, updateValue, type));
  }
}
