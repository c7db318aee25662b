import type { RelationEvent } from "./event.js";
import { log as rootLog } from "./logger.js";
import type { RelatedObject } from "./related-object.js";
import { Relation } from "./relation.js";
import { RelationType } from "./relation-type.js";
import type { ListenerScope, RelationListener } from "./types.js";

const log = rootLog.child("automatic");

/**
 * Base class for relation types that derive their value from changes of
 * other relations. When a relation with such a type is added to an object
 * the type registers itself as a listener on that object, and deregisters
 * when the relation is deleted again.
 *
 * The listener list depends on the kind of object holding the relation:
 * on a relation type it receives changes of all relations with that type,
 * on a relation it receives changes of that relation's value, and on any
 * other object it receives changes of that object's relations.
 */
export abstract class AutomaticType<T> extends RelationType<T> {
  /** The listener registered on objects that hold a relation of this type */
  readonly listener: RelationListener = (event) => this.handleEvent(event);

  handleEvent(event: RelationEvent<unknown>): void {
    if (!this.isRelevant(event)) return;

    // Derived values stay fixed once the relation has been frozen
    if (event.scope.getRelation(this)?.isImmutable()) return;

    this.processEvent(event);
  }

  override bindRelation(host: RelatedObject, relation: Relation<T>): Relation<T> {
    const bound = super.bindRelation(host, relation);

    if (this.isFinal() || this.isReadonly()) {
      this.protectTarget(host, bound);
    }

    this.registerRelationListener(host);
    log.debug("Bound automatic relation", {
      relationType: this.name,
      scope: this.getListenerScope(host),
    });

    return bound;
  }

  override unbindRelation(host: RelatedObject, relation: Relation<T>): void {
    this.unregisterRelationListener(host);
    super.unbindRelation(host, relation);
    log.debug("Unbound automatic relation", { relationType: this.name });
  }

  /**
   * Derives this type's value from a change. The relation to update is
   * found through the event scope, which is the object holding it.
   */
  protected abstract processEvent(event: RelationEvent<unknown>): void;

  /** Events for this type's own relations are ignored by default. */
  protected isRelevant(event: RelationEvent<unknown>): boolean {
    return event.relation.type !== this;
  }

  protected getListenerScope(host: RelatedObject): ListenerScope {
    if (host instanceof RelationType) return "type";
    if (host instanceof Relation) return "update";
    return "relation";
  }

  /**
   * Invoked once when a FINAL or READONLY relation is bound, before the
   * listener is registered.
   */
  protected protectTarget(_host: RelatedObject, _relation: Relation<T>): void {}

  protected registerRelationListener(host: RelatedObject): void {
    host.getListeners(this.getListenerScope(host)).add(this.listener);
  }

  protected unregisterRelationListener(host: RelatedObject): void {
    host.findListeners(this.getListenerScope(host))?.remove(this.listener);
  }
}
