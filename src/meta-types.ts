import { z } from "zod";
import { AutomaticType } from "./automatic-type.js";
import { IllegalMutation, ImmutableViolation } from "./errors.js";
import type { RelationEvent } from "./event.js";
import { SET_TARGET } from "./internal.js";
import { log as rootLog } from "./logger.js";
import type { RelatedObject } from "./related-object.js";
import type { Relation } from "./relation.js";
import { RelationType } from "./relation-type.js";
import { isImmutability, type ListenerScope, Modifier } from "./types.js";
import { isReadonlyView, readonlyView } from "./view.js";

const log = rootLog.child("immutable");

/**
 * The type of the IMMUTABLE flag. Setting the flag on an object freezes the
 * object: its relations become immutable (recursively, including their own
 * annotations), collection values are replaced by unmodifiable views, and
 * any later attempt to add, update or delete a relation of the object fails
 * with an ImmutableViolation.
 *
 * Private relations are left untouched.
 */
export class ImmutableFlagType extends AutomaticType<boolean> {
  constructor(name: string) {
    super(name, z.boolean(), { modifiers: [Modifier.FINAL] });
  }

  override bindRelation(host: RelatedObject, relation: Relation<boolean>): Relation<boolean> {
    if (relation.getTarget() !== true) {
      throw new IllegalMutation(`${this.name} can only be set to true`, {
        relationType: this.name,
      });
    }

    for (const child of host.getRelations()) {
      if (child.hasFlag(this)) continue;

      this.freezeTarget(child);
      child.set(this, true);
    }

    if (isImmutability(host)) {
      host.setImmutable();
    }

    const bound = super.bindRelation(host, relation);

    host.getListeners("relation").setImmutable();
    log.info("Object is now immutable", {
      host: host.constructor.name,
      relations: host.relationCount(),
    });

    return bound;
  }

  /** Only reached when adding the flag was vetoed; the host stays frozen. */
  override unbindRelation(_host: RelatedObject, _relation: Relation<boolean>): void {}

  protected override getListenerScope(_host: RelatedObject): ListenerScope {
    return "relation";
  }

  protected override processEvent(event: RelationEvent<unknown>): void {
    if (event.scope.hasRelation(this)) {
      log.debug("Rejected mutation of immutable object", {
        relationType: event.relation.type.name,
        eventType: event.type,
      });
      throw new ImmutableViolation(
        `Could not ${event.type} ${event.relation.type.name}; object is immutable`,
        { relationType: event.relation.type.name, eventType: event.type },
      );
    }
  }

  private freezeTarget(relation: Relation<unknown>): void {
    // Aliases and views show another relation's value
    if (relation.getWrappedRelation()) return;

    const value = relation.getTarget();

    if (value === null || typeof value !== "object" || isReadonlyView(value)) return;

    const kind = relation.type.collectionKind();
    const matches =
      (kind === "list" && Array.isArray(value)) ||
      (kind === "set" && value instanceof Set) ||
      (kind === "map" && value instanceof Map);

    if (matches) {
      relation[SET_TARGET](readonlyView(value));
    }
  }
}

/** Marks an object as immutable. Can only be set to true, and only once. */
export const IMMUTABLE = new ImmutableFlagType("IMMUTABLE");

/**
 * Upper bound for the size of a collection. Applied to relations with a
 * collector type, either directly or through the collector type itself.
 */
export const MAXIMUM = new RelationType("MAXIMUM", z.number().int().nonnegative());
