import { ImmutableViolation } from "./errors.js";

// Methods that mutate built-in collections - these are blocked on views
const MAP_MUTATORS = new Set(["set", "delete", "clear"]);
const SET_MUTATORS = new Set(["add", "delete", "clear"]);

// View -> original collection
const viewTargets = new WeakMap<object, object>();

function isMutatingMethod(obj: object, prop: string | symbol): boolean {
  if (typeof prop !== "string") return false;
  if (obj instanceof Map) return MAP_MUTATORS.has(prop);
  if (obj instanceof Set) return SET_MUTATORS.has(prop);
  return false;
}

function reject(operation: string, prop?: string | symbol): never {
  const member = prop === undefined ? "" : ` '${String(prop)}'`;
  throw new ImmutableViolation(`Cannot ${operation}${member} of an unmodifiable collection`);
}

/**
 * Create an unmodifiable view of an array, set or map. The view reflects
 * later changes of the original collection but rejects every mutation made
 * through it with an ImmutableViolation. Elements are not frozen.
 */
export function readonlyView<V extends object>(target: V): V {
  if (viewTargets.has(target)) return target;

  const view = new Proxy(target, {
    get(obj, prop, receiver) {
      // Map and Set keep their state in internal slots which are only
      // reachable with the original object as `this`
      if (obj instanceof Map || obj instanceof Set) {
        const value = Reflect.get(obj, prop, obj);
        if (typeof value === "function") {
          if (isMutatingMethod(obj, prop)) {
            return () => reject("call", prop);
          }
          return value.bind(obj);
        }
        return value;
      }

      return Reflect.get(obj, prop, receiver);
    },

    set(_obj, prop) {
      return reject("set", prop);
    },

    deleteProperty(_obj, prop) {
      return reject("delete", prop);
    },

    defineProperty(_obj, prop) {
      return reject("define", prop);
    },

    setPrototypeOf() {
      return reject("change the prototype");
    },

    preventExtensions() {
      return reject("prevent extensions");
    },
  });

  viewTargets.set(view, target);
  return view;
}

/**
 * Check if a value is a view created by readonlyView()
 */
export function isReadonlyView(value: unknown): boolean {
  return value !== null && typeof value === "object" && viewTargets.has(value);
}
