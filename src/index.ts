// Core
export { RelatedObject, type Relatable } from "./related-object.js";
export { Relation } from "./relation.js";
export {
  type CollectionKind,
  DEFAULT_NAMESPACE,
  NAME_PATTERN,
  RelationType,
  type RelationTypeOptions,
} from "./relation-type.js";
export { EventDispatcher, RelationEvent } from "./event.js";
export type {
  ListenerScope,
  RelationFilter,
  RelationListener,
  Schema,
  ValueFunction,
  Immutability,
} from "./types.js";
export { EventType, isImmutability, Modifier } from "./types.js";
// Relation type factories
export {
  type ModifierOptions,
  newDefaultValueType,
  newFlagType,
  newInitialValueType,
  newIntType,
  newListType,
  newMapType,
  newObjectType,
  newSetType,
  newStringType,
  newType,
} from "./relation-types.js";
// Reactive types
export { AutomaticType } from "./automatic-type.js";
export { type CounterOptions, type CounterPredicate, CounterType, newIntCounter } from "./counter-type.js";
export {
  type CollectFunction,
  type CollectorOptions,
  CollectorType,
  newCollector,
  newDistinctCollector,
} from "./collector-type.js";
export { type ConstraintOptions, ConstraintType } from "./constraint-type.js";
export { type ListenerDispatch, ListenerType, type ListenerTypeOptions } from "./listener-type.js";
export { type Clock, type TimerOptions, TimerType } from "./timer-type.js";
// Meta and standard types
export { IMMUTABLE, ImmutableFlagType, MAXIMUM } from "./meta-types.js";
export { DESCRIPTION, INFO, NAME, TIMER } from "./standard-types.js";
// Relations of arbitrary objects
export { getRelatable, hasRelatable, removeRelatable } from "./object-relations.js";
// Unmodifiable collection views
export { isReadonlyView, readonlyView } from "./view.js";
// Errors, configuration and logging
export {
  ConstraintViolation,
  IllegalMutation,
  ImmutableViolation,
  InvalidRelationType,
  RelationError,
  type RelationErrorCode,
  TypeMismatch,
  UnsupportedDerivation,
} from "./errors.js";
export { configure, getConfig, type LogHandler, type RelationsConfig, type RelationsOptions, resetConfig } from "./config.js";
export { createLogger, type LogEntry, type LogLevel, RelationLogger } from "./logger.js";
