import { z } from "zod";
import { getConfig } from "./config.js";
import { IllegalMutation, InvalidRelationType, TypeMismatch } from "./errors.js";
import { SET_TARGET } from "./internal.js";
import { log as rootLog } from "./logger.js";
import { RelatedObject } from "./related-object.js";
import { Relation } from "./relation.js";
import {
  Modifier,
  type RelationListener,
  type Schema,
  type ValueFunction,
} from "./types.js";

const log = rootLog.child("registry");

export const NAME_PATTERN = /^([\p{L}_$][\p{L}\p{N}_$]*\.)*[\p{L}_$][\p{L}\p{N}_$]*$/u;

export const DEFAULT_NAMESPACE = "";

export type CollectionKind = "list" | "set" | "map";

export interface RelationTypeOptions<T> {
  modifiers?: readonly Modifier[];
  /** Computed on each read of a missing relation; never stored. */
  defaultValue?: ValueFunction<T>;
  /** Computed and stored as a new relation on the first read. */
  initialValue?: ValueFunction<T>;
}

// Name -> relation type
const registry = new Map<string, RelationType<unknown>>();

/**
 * A named, typed key for relations. Relation types are created once,
 * usually as module constants, and registered globally under their name.
 * The declared value type is a zod schema that is checked whenever a value
 * is set.
 *
 * @example
 * ```typescript
 * const PRICE = new RelationType("shop.PRICE", z.number().nonnegative());
 *
 * const item = new RelatedObject();
 * item.set(PRICE, 42);
 * item.get(PRICE); // 42
 * ```
 */
export class RelationType<T> extends RelatedObject {
  readonly name: string;
  /** The declared value type */
  readonly datatype: z.ZodTypeAny;

  private readonly modifiers: ReadonlySet<Modifier>;
  private readonly defaultValueFn: ValueFunction<T> | undefined;
  private readonly initialValueFn: ValueFunction<T> | undefined;

  constructor(name: string, datatype: Schema<T>, options: RelationTypeOptions<T> = {}) {
    super();

    if (!NAME_PATTERN.test(name)) {
      throw new InvalidRelationType(`Invalid relation type name: ${name}`, { name });
    }
    if (registry.has(name)) {
      throw new InvalidRelationType(`Duplicate relation type name: ${name}`, { name });
    }

    this.name = name;
    this.datatype = datatype;
    this.modifiers = new Set(options.modifiers ?? []);
    this.defaultValueFn = options.defaultValue;
    this.initialValueFn = options.initialValue;

    registry.set(name, this);
    log.debug("Registered relation type", { name, modifiers: [...this.modifiers] });
  }

  static valueOf(name: string): RelationType<unknown> | undefined {
    return registry.get(name);
  }

  static getRegisteredRelationTypes(
    filter?: (type: RelationType<unknown>) => boolean,
  ): RelationType<unknown>[] {
    const types = [...registry.values()];
    return filter ? types.filter(filter) : types;
  }

  /**
   * Removes a type from the registry so that its name can be reused.
   * Existing relations with the type are not affected.
   */
  static unregister(type: RelationType<unknown>): boolean {
    if (registry.get(type.name) !== type) return false;

    registry.delete(type.name);
    log.debug("Unregistered relation type", { name: type.name });
    return true;
  }

  get namespace(): string {
    const index = this.name.lastIndexOf(".");
    return index > 0 ? this.name.substring(0, index) : DEFAULT_NAMESPACE;
  }

  get simpleName(): string {
    return this.name.substring(this.name.lastIndexOf(".") + 1);
  }

  hasModifier(modifier: Modifier): boolean {
    return this.modifiers.has(modifier);
  }

  isFinal(): boolean {
    return this.hasModifier(Modifier.FINAL);
  }

  isReadonly(): boolean {
    return this.hasModifier(Modifier.READONLY);
  }

  isPrivate(): boolean {
    return this.hasModifier(Modifier.PRIVATE);
  }

  hasDefaultValue(): boolean {
    return this.defaultValueFn !== undefined;
  }

  defaultValue(host: RelatedObject): T | undefined {
    return this.defaultValueFn?.(host);
  }

  /**
   * The value of a relation created on first access. Without an initial
   * value function, list, set and map types start with an empty collection.
   */
  initialValue(host: RelatedObject): T | undefined {
    if (this.initialValueFn) return this.initialValueFn(host);

    let empty: unknown;

    switch (this.collectionKind()) {
      case "list":
        empty = [];
        break;
      case "set":
        empty = new Set();
        break;
      case "map":
        empty = new Map();
        break;
      default:
        return undefined;
    }

    return this.isValidTarget(empty) ? empty : undefined;
  }

  /**
   * The collection kind if the declared type is exactly an array, set or
   * map schema.
   */
  collectionKind(): CollectionKind | undefined {
    if (this.datatype instanceof z.ZodArray) return "list";
    if (this.datatype instanceof z.ZodSet) return "set";
    if (this.datatype instanceof z.ZodMap) return "map";
    return undefined;
  }

  isValidTarget(value: unknown): value is T {
    return this.datatype.safeParse(value).success;
  }

  /**
   * Throws a TypeMismatch if the value does not match the declared type.
   * Skipped when target checks are disabled in the configuration.
   */
  checkValidTarget(value: unknown): void {
    if (!getConfig().checkTargets) return;

    const result = this.datatype.safeParse(value);

    if (!result.success) {
      const issues = result.error.issues.map((issue) => issue.message).join("; ");
      throw new TypeMismatch(`Invalid value for ${this.name}: ${issues}`, {
        relationType: this.name,
        issues: result.error.issues,
      });
    }
  }

  checkReadonly(): void {
    if (this.isReadonly()) {
      throw new IllegalMutation(`Relation is readonly: ${this.name}`, { relationType: this.name });
    }
  }

  checkUpdateAllowed(): void {
    this.checkReadonly();

    if (this.isFinal()) {
      throw new IllegalMutation(`Relation is final: ${this.name}`, { relationType: this.name });
    }
  }

  ownsRelation(relation: Relation<unknown>): relation is Relation<T> {
    return relation.type === this;
  }

  newRelation(_host: RelatedObject, target: T): Relation<T> {
    return new Relation(this, target);
  }

  /**
   * Invoked by a host before a new relation with this type becomes visible.
   * Returns the relation to store, which subclasses may replace.
   */
  bindRelation(_host: RelatedObject, relation: Relation<T>): Relation<T> {
    return relation;
  }

  /** Invoked by a host when a relation with this type is deleted. */
  unbindRelation(_host: RelatedObject, _relation: Relation<T>): void {}

  /** Invoked before listeners are notified of an update. */
  prepareRelationUpdate(_host: RelatedObject, _relation: Relation<T>, _value: T): void {}

  annotate<V>(type: RelationType<V>, value: V): this {
    this.set(type, value);
    return this;
  }

  annotateFlag(type: RelationType<boolean>): this {
    return this.annotate(type, true);
  }

  /**
   * Registers a listener for changes of relations with this type on any
   * object.
   */
  addTypeListener(listener: RelationListener): void {
    this.getListeners("type").add(listener);
  }

  removeTypeListener(listener: RelationListener): boolean {
    return this.findListeners("type")?.remove(listener) ?? false;
  }

  override toString(): string {
    return this.name;
  }

  /**
   * Framework path for updating a relation of this type: bypasses the FINAL
   * and READONLY modifiers but not immutability.
   */
  protected setRelationTarget(relation: Relation<T>, value: T): void {
    relation[SET_TARGET](value);
  }
}
