import { z } from "zod";
import { AutomaticType } from "./automatic-type.js";
import { UnsupportedDerivation } from "./errors.js";
import type { RelationEvent } from "./event.js";
import type { RelatedObject } from "./related-object.js";
import type { Modifier } from "./types.js";

export type ListenerDispatch<L> = (listener: L, event: RelationEvent<unknown>) => void;

export interface ListenerTypeOptions {
  modifiers?: readonly Modifier[];
}

/**
 * A relation type that holds a list of application listeners of type L.
 * Relation events on the holding object are forwarded to the listeners
 * through the dispatch function; without one the type only stores the
 * listeners and they have to be notified explicitly with notifyListeners().
 */
export class ListenerType<L> extends AutomaticType<L[]> {
  constructor(
    name: string,
    private readonly dispatch?: ListenerDispatch<L>,
    options: ListenerTypeOptions = {},
  ) {
    super(name, z.array(z.custom<L>()), options);
  }

  addListener(host: RelatedObject, listener: L): void {
    const listeners = host.getRelation(this);

    if (listeners) {
      listeners.getTarget().push(listener);
    } else {
      host.set(this, [listener]);
    }
  }

  removeListener(host: RelatedObject, listener: L): boolean {
    const listeners = host.getRelation(this)?.getTarget();
    const index = listeners?.indexOf(listener) ?? -1;

    if (!listeners || index < 0) return false;

    listeners.splice(index, 1);
    return true;
  }

  /** Invokes all listeners registered on the host with the given event. */
  notifyListeners(host: RelatedObject, event: RelationEvent<unknown>): void {
    const dispatch = this.dispatch;

    if (!dispatch) {
      throw new UnsupportedDerivation(`No event dispatch defined for ${this.name}`, {
        relationType: this.name,
      });
    }

    // Listeners may remove themselves while being notified
    for (const listener of [...(host.getRelation(this)?.getTarget() ?? [])]) {
      dispatch(listener, event);
    }
  }

  protected override processEvent(event: RelationEvent<unknown>): void {
    this.notifyListeners(event.scope, event);
  }
}
