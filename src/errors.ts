export type RelationErrorCode =
  | "TYPE_MISMATCH"
  | "ILLEGAL_MUTATION"
  | "CONSTRAINT_VIOLATION"
  | "IMMUTABLE_VIOLATION"
  | "UNSUPPORTED_DERIVATION"
  | "INVALID_RELATION_TYPE";

/**
 * Base class of all errors raised by the relation framework.
 *
 * @example
 * ```typescript
 * try {
 *   host.set(PRICE, -1);
 * } catch (error) {
 *   if (RelationError.isCode(error, "CONSTRAINT_VIOLATION")) {
 *     // the previous price is still in place
 *   }
 * }
 * ```
 */
export class RelationError extends Error {
  readonly code: RelationErrorCode;
  readonly context: Record<string, unknown>;

  constructor(code: RelationErrorCode, message: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }

  static isCode(error: unknown, code: RelationErrorCode): error is RelationError {
    return error instanceof RelationError && error.code === code;
  }
}

/** A value does not match the declared type of a relation type. */
export class TypeMismatch extends RelationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("TYPE_MISMATCH", message, context);
  }
}

/** A final relation was modified again, or a readonly one from outside. */
export class IllegalMutation extends RelationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("ILLEGAL_MUTATION", message, context);
  }
}

export class ConstraintViolation extends RelationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("CONSTRAINT_VIOLATION", message, context);
  }
}

/** Mutation of a host, relation or collection view that has been frozen. */
export class ImmutableViolation extends RelationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("IMMUTABLE_VIOLATION", message, context);
  }
}

export class UnsupportedDerivation extends RelationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("UNSUPPORTED_DERIVATION", message, context);
  }
}

/** Invalid or duplicate relation type name. */
export class InvalidRelationType extends RelationError {
  constructor(message: string, context?: Record<string, unknown>) {
    super("INVALID_RELATION_TYPE", message, context);
  }
}
