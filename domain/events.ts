/**
 * Repository events: immutable notifications for an injected reporter.
 * The core never picks a destination or format.
 */

import type { EntityKind } from "./core.js";

export type RepositoryOperation = "create" | "read" | "list" | "update" | "delete";

export interface EntityCreated {
  readonly type: "EntityCreated";
  readonly entity: EntityKind;
  readonly id: number;
}

export interface EntityUpdated {
  readonly type: "EntityUpdated";
  readonly entity: EntityKind;
  readonly id: number;
}

export interface EntityDeleted {
  readonly type: "EntityDeleted";
  readonly entity: EntityKind;
  readonly id: number;
  /** Tasks whose reference to the deleted entity was cleared. */
  readonly clearedTaskIds: readonly number[];
}

export interface ValidationRejected {
  readonly type: "ValidationRejected";
  readonly entity: EntityKind;
  readonly operation: RepositoryOperation;
  readonly field: string;
  readonly message: string;
}

export interface ReferenceRejected {
  readonly type: "ReferenceRejected";
  readonly entity: EntityKind;
  readonly operation: RepositoryOperation;
  readonly field: string;
  readonly referencedId: number;
}

export interface StorageFault {
  readonly type: "StorageFault";
  readonly entity: EntityKind;
  readonly operation: RepositoryOperation;
  readonly message: string;
}

export type RepositoryEvent =
  | EntityCreated
  | EntityUpdated
  | EntityDeleted
  | ValidationRejected
  | ReferenceRejected
  | StorageFault;

/** Sink for repository events. Supplied by the embedding application. */
export interface EventReporter {
  report(event: RepositoryEvent): void;
}

/** Reporter that drops every event. */
export const silentReporter: EventReporter = {
  report(): void {},
};

/** Reporter that keeps events in memory. For tests and diagnostics. */
export class RecordingReporter implements EventReporter {
  readonly events: RepositoryEvent[] = [];

  report(event: RepositoryEvent): void {
    this.events.push(event);
  }

  /** Reset for tests. Not on EventReporter interface. */
  clear(): void {
    this.events.length = 0;
  }
}
