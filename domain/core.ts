/**
 * Domain core: structural primitives only.
 * Framework-independent. No business assumptions.
 */

// --- Branded scalars (safer than plain numbers) ---

export type Brand<T, B extends string> = T & { readonly __brand: B };

/** Store-assigned surrogate key of a Person. */
export type PersonId = Brand<number, "PersonId">;

/** Store-assigned surrogate key of a Milestone. */
export type MilestoneId = Brand<number, "MilestoneId">;

/** Store-assigned surrogate key of a Task. */
export type TaskId = Brand<number, "TaskId">;

/** Date-only string (YYYY-MM-DD). */
export type DateOnly = string;

// --- Constructors (no validation yet) ---

export const asPersonId = (n: number) => n as PersonId;
export const asMilestoneId = (n: number) => n as MilestoneId;
export const asTaskId = (n: number) => n as TaskId;

// --- Base object ---

/** Minimal domain object: has an identity. */
export interface DomainObject<Id = number> {
  readonly id: Id;
}

/** Entity kinds held by the repository. */
export type EntityKind = "person" | "milestone" | "task";
