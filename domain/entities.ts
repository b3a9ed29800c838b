/**
 * Entity model: Person, Milestone, Task.
 * Constructors validate field invariants and return frozen snapshots.
 */

import type { DateOnly, DomainObject, MilestoneId, PersonId, TaskId } from "./core.js";
import { asMilestoneId, asPersonId, asTaskId } from "./core.js";
import { ValidationError } from "./errors.js";
import { err, ok, type Result } from "./result.js";
import { checkDate, checkEmail, requireText } from "./validation.js";

export const TASK_STATUSES = ["Not Started", "In Progress", "Completed", "Blocked"] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

export const TASK_PRIORITIES = ["Low", "Medium", "High"] as const;
export type TaskPriority = (typeof TASK_PRIORITIES)[number];

export function isTaskStatus(value: string): value is TaskStatus {
  return (TASK_STATUSES as readonly string[]).includes(value);
}

export function isTaskPriority(value: string): value is TaskPriority {
  return (TASK_PRIORITIES as readonly string[]).includes(value);
}

export interface Person extends DomainObject<PersonId> {
  readonly name: string;
  readonly email: string;
  readonly role: string;
}

export interface Milestone extends DomainObject<MilestoneId> {
  readonly name: string;
  readonly targetDate: DateOnly | null;
}

export interface Task extends DomainObject<TaskId> {
  readonly title: string;
  readonly description: string;
  readonly status: TaskStatus;
  readonly priority: TaskPriority;
  readonly startDate: DateOnly;
  readonly dueDate: DateOnly;
  /** Non-owning reference; resolve through the repository. */
  readonly assigneeId: PersonId | null;
  /** Non-owning reference; resolve through the repository. */
  readonly milestoneId: MilestoneId | null;
}

// --- Drafts (records without id) ---

export interface PersonDraft {
  readonly name: string;
  readonly email: string;
  readonly role?: string;
}

export interface MilestoneDraft {
  readonly name: string;
  readonly targetDate?: DateOnly | null;
}

export interface TaskDraft {
  readonly title: string;
  readonly description?: string;
  readonly status?: TaskStatus;
  readonly priority?: TaskPriority;
  readonly startDate: DateOnly;
  readonly dueDate: DateOnly;
  readonly assigneeId?: PersonId | null;
  readonly milestoneId?: MilestoneId | null;
}

/**
 * Untyped field values as they arrive from a form or a stored row.
 * Enum and date fields are plain strings until validated.
 */
export interface TaskInput {
  readonly id: number;
  readonly title: string;
  readonly description?: string;
  readonly status?: string;
  readonly priority?: string;
  readonly startDate: string;
  readonly dueDate: string;
  readonly assigneeId?: number | null;
  readonly milestoneId?: number | null;
}

export interface PersonInput {
  readonly id: number;
  readonly name: string;
  readonly email: string;
  readonly role?: string;
}

export interface MilestoneInput {
  readonly id: number;
  readonly name: string;
  readonly targetDate?: string | null;
}

function checkId(field: string, value: number): ValidationError | null {
  if (!Number.isInteger(value) || value <= 0) {
    return new ValidationError(field, `${field} must be a positive integer`, { value });
  }
  return null;
}

export function createPerson(input: PersonInput): Result<Person, ValidationError> {
  const idError = checkId("id", input.id);
  if (idError) return err(idError);
  const name = requireText("name", input.name);
  if (name instanceof ValidationError) return err(name);
  const email = input.email;
  const emailError = checkEmail("email", email);
  if (emailError) return err(emailError);

  return ok(
    Object.freeze({
      id: asPersonId(input.id),
      name,
      email,
      role: input.role ?? "",
    })
  );
}

export function createMilestone(input: MilestoneInput): Result<Milestone, ValidationError> {
  const idError = checkId("id", input.id);
  if (idError) return err(idError);
  const name = requireText("name", input.name);
  if (name instanceof ValidationError) return err(name);
  const targetDate = input.targetDate ?? null;
  if (targetDate !== null) {
    const dateError = checkDate("targetDate", targetDate);
    if (dateError) return err(dateError);
  }

  return ok(Object.freeze({ id: asMilestoneId(input.id), name, targetDate }));
}

export function createTask(input: TaskInput): Result<Task, ValidationError> {
  const idError = checkId("id", input.id);
  if (idError) return err(idError);
  const title = requireText("title", input.title);
  if (title instanceof ValidationError) return err(title);

  const status = input.status ?? "Not Started";
  if (!isTaskStatus(status)) {
    return err(
      new ValidationError("status", `status must be one of ${TASK_STATUSES.join(", ")}`, { value: status })
    );
  }
  const priority = input.priority ?? "Medium";
  if (!isTaskPriority(priority)) {
    return err(
      new ValidationError("priority", `priority must be one of ${TASK_PRIORITIES.join(", ")}`, {
        value: priority,
      })
    );
  }

  const startError = checkDate("startDate", input.startDate);
  if (startError) return err(startError);
  const dueError = checkDate("dueDate", input.dueDate);
  if (dueError) return err(dueError);
  if (input.startDate > input.dueDate) {
    return err(
      new ValidationError("dueDate", "dueDate must not be earlier than startDate", {
        startDate: input.startDate,
        dueDate: input.dueDate,
      })
    );
  }

  const assigneeId = input.assigneeId ?? null;
  if (assigneeId !== null) {
    const refError = checkId("assigneeId", assigneeId);
    if (refError) return err(refError);
  }
  const milestoneId = input.milestoneId ?? null;
  if (milestoneId !== null) {
    const refError = checkId("milestoneId", milestoneId);
    if (refError) return err(refError);
  }

  return ok(
    Object.freeze({
      id: asTaskId(input.id),
      title,
      description: input.description ?? "",
      status,
      priority,
      startDate: input.startDate,
      dueDate: input.dueDate,
      assigneeId: assigneeId === null ? null : asPersonId(assigneeId),
      milestoneId: milestoneId === null ? null : asMilestoneId(milestoneId),
    })
  );
}

/** Equality by identifier. */
export function sameEntity<Id>(a: DomainObject<Id>, b: DomainObject<Id>): boolean {
  return a.id === b.id;
}
