import { IllegalMutation, ImmutableViolation } from "./errors.js";
import { ATTACH_RELATION, RELATION_REMOVED, SET_TARGET } from "./internal.js";
import { RelatedObject } from "./related-object.js";
import type { RelationType } from "./relation-type.js";
import type { Immutability, RelationListener } from "./types.js";

interface AliasEntry {
  host: RelatedObject;
  alias: Relation<unknown>;
}

// Aliases and views of a relation, deleted from their hosts with it
const aliasRegistry = new WeakMap<Relation<unknown>, AliasEntry[]>();

/**
 * The value of a relation type on a particular object. Relations are
 * related objects themselves and can therefore carry meta-relations
 * (annotations).
 */
export class Relation<T> extends RelatedObject implements Immutability {
  private targetFrozen = false;

  constructor(
    readonly type: RelationType<T>,
    private target: T,
  ) {
    super();
  }

  getTarget(): T {
    return this.target;
  }

  /**
   * Replaces the value without modifier checks and without notifying
   * listeners. Only reachable from inside the framework; applications call
   * `set()` on the object that holds the relation.
   */
  [SET_TARGET](value: T): void {
    this.checkMutable();
    this.type.checkValidTarget(value);
    this.target = value;
  }

  checkMutable(): void {
    if (this.targetFrozen) {
      throw new ImmutableViolation(`Relation is immutable: ${this.type.name}`, {
        relationType: this.type.name,
      });
    }
  }

  setImmutable(): void {
    this.targetFrozen = true;
  }

  override isImmutable(): boolean {
    return this.targetFrozen || super.isImmutable();
  }

  /** The relation shown by an alias or view; undefined for plain relations. */
  getWrappedRelation(): Relation<unknown> | undefined {
    return undefined;
  }

  /**
   * Makes this relation available on another object under a different
   * type. Setting the alias updates this relation, subject to this
   * relation's modifiers and immutability.
   */
  aliasAs(aliasType: RelationType<T>, host: RelatedObject): Relation<T> {
    return this.addAlias(new RelationAlias(aliasType, this), host);
  }

  /**
   * Like `aliasAs()` but read-only, and the value is converted on every
   * read.
   */
  viewAs<V>(
    viewType: RelationType<V>,
    host: RelatedObject,
    conversion: (value: T) => V,
  ): Relation<V> {
    return this.addAlias(new RelationView(viewType, this, conversion), host);
  }

  annotate<V>(type: RelationType<V>, value: V): this {
    this.set(type, value);
    return this;
  }

  annotateFlag(type: RelationType<boolean>): this {
    return this.annotate(type, true);
  }

  /**
   * Looks up an annotation on this relation first and on its relation type
   * second.
   */
  getAnnotation<V>(type: RelationType<V>): V | undefined {
    if (this.hasRelation(type)) return this.get(type);
    if (this.type.hasRelation(type)) return this.type.get(type);
    return undefined;
  }

  hasAnnotation(type: RelationType<unknown>): boolean {
    return this.hasRelation(type) || this.type.hasRelation(type);
  }

  /** Registers a listener for changes of this relation's value. */
  addUpdateListener(listener: RelationListener): void {
    this.getListeners("update").add(listener);
  }

  removeUpdateListener(listener: RelationListener): boolean {
    return this.findListeners("update")?.remove(listener) ?? false;
  }

  override toString(): string {
    return `Relation[${this.type.name}=${String(this.getTarget())}]`;
  }

  [RELATION_REMOVED](): void {
    const entries = aliasRegistry.get(this);
    aliasRegistry.delete(this);

    for (const { host, alias } of entries ?? []) {
      // Frozen hosts keep their aliases
      if (host.getRelation(alias.type) === alias && !host.isImmutable()) {
        host.deleteRelation(alias.type);
      }
    }
  }

  private addAlias<V>(alias: Relation<V>, host: RelatedObject): Relation<V> {
    const added = host[ATTACH_RELATION](alias);
    const entries = aliasRegistry.get(this) ?? [];

    entries.push({ host, alias: added });
    aliasRegistry.set(this, entries);

    return added;
  }
}

function removeAliasEntry(relation: Relation<unknown>, alias: Relation<unknown>): void {
  const entries = aliasRegistry.get(relation);
  const index = entries?.findIndex((entry) => entry.alias === alias) ?? -1;

  if (entries && index >= 0) {
    entries.splice(index, 1);
  }
}

class RelationAlias<T> extends Relation<T> {
  constructor(
    type: RelationType<T>,
    private readonly aliased: Relation<T>,
  ) {
    super(type, aliased.getTarget());
  }

  override getTarget(): T {
    return this.aliased.getTarget();
  }

  override getWrappedRelation(): Relation<unknown> {
    return this.aliased;
  }

  override checkMutable(): void {
    super.checkMutable();
    this.aliased.type.checkUpdateAllowed();
    this.aliased.checkMutable();
  }

  override [SET_TARGET](value: T): void {
    this.checkMutable();
    this.aliased[SET_TARGET](value);
  }

  override [RELATION_REMOVED](): void {
    removeAliasEntry(this.aliased, this);
    super[RELATION_REMOVED]();
  }
}

class RelationView<T, V> extends Relation<V> {
  constructor(
    type: RelationType<V>,
    private readonly viewed: Relation<T>,
    private readonly conversion: (value: T) => V,
  ) {
    super(type, conversion(viewed.getTarget()));
  }

  override getTarget(): V {
    return this.conversion(this.viewed.getTarget());
  }

  override getWrappedRelation(): Relation<unknown> {
    return this.viewed;
  }

  override checkMutable(): void {
    throw new IllegalMutation(`Relation view is readonly: ${this.type.name}`, {
      relationType: this.type.name,
    });
  }

  override [RELATION_REMOVED](): void {
    removeAliasEntry(this.viewed, this);
    super[RELATION_REMOVED]();
  }
}
