import { z } from "zod";
import { RelationType, type RelationTypeOptions } from "./relation-type.js";
import type { Modifier, Schema, ValueFunction } from "./types.js";

export interface ModifierOptions {
  modifiers?: readonly Modifier[];
}

export function newType<T>(
  name: string,
  datatype: Schema<T>,
  options?: RelationTypeOptions<T>,
): RelationType<T> {
  return new RelationType(name, datatype, options);
}

/** A boolean type with the initial value false. */
export function newFlagType(name: string, options: ModifierOptions = {}): RelationType<boolean> {
  return new RelationType(name, z.boolean(), { ...options, initialValue: () => false });
}

export function newIntType(
  name: string,
  initial = 0,
  options: ModifierOptions = {},
): RelationType<number> {
  return new RelationType(name, z.number().int(), { ...options, initialValue: () => initial });
}

export function newStringType(name: string, options: ModifierOptions = {}): RelationType<string> {
  return new RelationType(name, z.string(), options);
}

export function newObjectType(name: string, options: ModifierOptions = {}): RelationType<unknown> {
  return new RelationType(name, z.unknown(), options);
}

/**
 * A type that returns a constant default for objects without a relation of
 * this type. The default is never stored.
 */
export function newDefaultValueType<T>(
  name: string,
  datatype: Schema<T>,
  defaultValue: T,
  options: ModifierOptions = {},
): RelationType<T> {
  return new RelationType(name, datatype, { ...options, defaultValue: () => defaultValue });
}

/**
 * A type that stores the result of a function as a new relation when it is
 * first read from an object.
 */
export function newInitialValueType<T>(
  name: string,
  datatype: Schema<T>,
  initialValue: ValueFunction<T>,
  options: ModifierOptions = {},
): RelationType<T> {
  return new RelationType(name, datatype, { ...options, initialValue });
}

/** A list type that starts with an empty array. */
export function newListType<T>(
  name: string,
  elementType: Schema<T>,
  options: ModifierOptions = {},
): RelationType<T[]> {
  return new RelationType(name, z.array(elementType), options);
}

/** A set type that starts with an empty set. */
export function newSetType<T>(
  name: string,
  elementType: Schema<T>,
  options: ModifierOptions = {},
): RelationType<Set<T>> {
  return new RelationType(name, z.set(elementType), options);
}

/** A map type that starts with an empty map. */
export function newMapType<K, V>(
  name: string,
  keyType: Schema<K>,
  valueType: Schema<V>,
  options: ModifierOptions = {},
): RelationType<Map<K, V>> {
  return new RelationType(name, z.map(keyType, valueType), options);
}
