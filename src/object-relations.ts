import { RelatedObject } from "./related-object.js";

// Object -> relations attached to it from outside
const relatables = new WeakMap<object, RelatedObject>();

/**
 * Returns the relations of an arbitrary object. Related objects are returned
 * as they are; for any other object a separate container is created on the
 * first call and kept for as long as the object is reachable.
 *
 * @example
 * ```typescript
 * const config = { port: 8080 };
 * getRelatable(config).set(DESCRIPTION, "server settings");
 * getRelatable(config).get(DESCRIPTION); // "server settings"
 * ```
 */
export function getRelatable(target: object): RelatedObject {
  if (target instanceof RelatedObject) return target;

  let relatable = relatables.get(target);
  if (!relatable) {
    relatable = new RelatedObject();
    relatables.set(target, relatable);
  }

  return relatable;
}

/**
 * Check if relations have been attached to an object
 */
export function hasRelatable(target: object): boolean {
  return target instanceof RelatedObject || relatables.has(target);
}

/**
 * Drops the relations attached to a plain object. Related objects are not
 * affected.
 */
export function removeRelatable(target: object): boolean {
  return relatables.delete(target);
}
