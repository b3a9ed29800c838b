/**
 * Domain error model: base and concrete error types.
 * Framework-independent. No business logic.
 */

/** Optional metadata attached to domain errors. */
export type ErrorMetadata = Record<string, unknown>;

/** Base for all domain errors. Preserves prototype chain for instanceof. */
export class DomainError extends Error {
  readonly metadata: ErrorMetadata | undefined;

  constructor(message: string, metadata?: ErrorMetadata) {
    super(message);
    this.name = this.constructor.name;
    this.metadata = metadata;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Input is malformed or breaks an entity invariant. Names the field. */
export class ValidationError extends DomainError {
  readonly field: string;

  constructor(field: string, message: string, metadata?: ErrorMetadata) {
    super(message, { field, ...metadata });
    this.field = field;
  }
}

/** Identifier does not resolve. */
export class NotFoundError extends DomainError {
  constructor(message: string, metadata?: ErrorMetadata) {
    super(message, metadata);
  }
}

/** A task points at a Person or Milestone that does not exist. */
export class DanglingReferenceError extends DomainError {
  readonly field: "assigneeId" | "milestoneId";
  readonly referencedId: number;

  constructor(field: "assigneeId" | "milestoneId", referencedId: number) {
    const target = field === "assigneeId" ? "Person" : "Milestone";
    super(`${target} ${referencedId} does not exist`, { field, referencedId });
    this.field = field;
    this.referencedId = referencedId;
  }
}

/** The underlying store is unavailable or corrupt. Fatal to the operation only. */
export class StorageError extends DomainError {
  override readonly cause: unknown;

  constructor(message: string, cause?: unknown) {
    super(message, cause instanceof Error ? { cause: cause.message } : undefined);
    this.cause = cause;
  }
}

/** Errors a repository operation can return. */
export type RepositoryError =
  | ValidationError
  | NotFoundError
  | DanglingReferenceError
  | StorageError;
