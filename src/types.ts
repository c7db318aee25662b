import type { z } from "zod";
import type { RelatedObject } from "./related-object.js";
import type { RelationEvent } from "./event.js";
import type { Relation } from "./relation.js";

/**
 * Schema describing the values a relation type accepts. Only the output
 * type matters; the input side is left open so that schemas with defaults
 * or coercion still fit.
 */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export const EventType = {
  ADD: "ADD",
  UPDATE: "UPDATE",
  REMOVE: "REMOVE",
} as const;

export type EventType = (typeof EventType)[keyof typeof EventType];

export const Modifier = {
  /** Can be set once; never updated or deleted afterwards. */
  FINAL: "FINAL",
  /** Never set from outside; the value comes from the initial value. */
  READONLY: "READONLY",
  /** Hidden from queries and never reported to listeners. */
  PRIVATE: "PRIVATE",
} as const;

export type Modifier = (typeof Modifier)[keyof typeof Modifier];

// Which listener list of a host an event is dispatched through
export type ListenerScope = "relation" | "type" | "update";

export type RelationListener = (event: RelationEvent<unknown>) => void;

export type RelationFilter = (relation: Relation<unknown>) => boolean;

/** Computes a value for a host, e.g. a default or initial relation value. */
export type ValueFunction<T> = (host: RelatedObject) => T;

/**
 * Capability of hosts that can be frozen explicitly. The IMMUTABLE flag
 * invokes it after all relations of the host have been frozen.
 */
export interface Immutability {
  setImmutable(): void;
}

export function isImmutability(value: unknown): value is Immutability {
  return (
    value !== null &&
    typeof value === "object" &&
    "setImmutable" in value &&
    typeof value.setImmutable === "function"
  );
}
