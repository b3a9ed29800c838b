/**
 * Query / filter engine over in-memory entity lists.
 * Pure. Every function preserves the relative order of its input.
 */

import type { MilestoneId, PersonId } from "./core.js";
import type { Milestone, Person, Task, TaskPriority, TaskStatus } from "./entities.js";
import { neverReached } from "./validation.js";

/** Keys of T whose values are strings. */
export type TextField<T> = { [K in keyof T]-?: T[K] extends string ? K : never }[keyof T];

export type MatchMode = "substring" | "exact";

export interface TextFilterOptions<T> {
  readonly field: TextField<T>;
  /** Default false. */
  readonly caseSensitive?: boolean;
  /** Default "substring". */
  readonly matchMode?: MatchMode;
}

/**
 * Items whose `field` matches `query`. An empty query returns every item.
 */
export function filterByText<T>(
  items: readonly T[],
  query: string,
  options: TextFilterOptions<T>
): T[] {
  if (query === "") return [...items];
  const caseSensitive = options.caseSensitive ?? false;
  const mode = options.matchMode ?? "substring";
  const needle = caseSensitive ? query : query.toLowerCase();

  return items.filter((item) => {
    const raw = item[options.field];
    if (typeof raw !== "string") return false;
    const haystack = caseSensitive ? raw : raw.toLowerCase();
    switch (mode) {
      case "substring":
        return haystack.includes(needle);
      case "exact":
        return haystack === needle;
      default:
        return neverReached(mode, "Unknown match mode");
    }
  });
}

export interface TaskCriteria {
  readonly status?: TaskStatus;
  readonly priority?: TaskPriority;
  /** `null` selects unassigned tasks. */
  readonly assigneeId?: PersonId | null;
  /** `null` selects tasks outside any milestone. */
  readonly milestoneId?: MilestoneId | null;
}

/** Field-based filter. Omitted criteria match everything. */
export function filterTasks(tasks: readonly Task[], criteria: TaskCriteria): Task[] {
  return tasks.filter(
    (t) =>
      (criteria.status === undefined || t.status === criteria.status) &&
      (criteria.priority === undefined || t.priority === criteria.priority) &&
      (criteria.assigneeId === undefined || t.assigneeId === criteria.assigneeId) &&
      (criteria.milestoneId === undefined || t.milestoneId === criteria.milestoneId)
  );
}

// --- Sorting ---

export type PersonSortKey = "id" | "name" | "email" | "role";
export type MilestoneSortKey = "id" | "name" | "targetDate";
export type TaskSortKey = "id" | "title" | "status" | "priority" | "startDate" | "dueDate";

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/** Workflow order: Not Started, In Progress, Blocked, Completed. */
export function statusRank(status: TaskStatus): number {
  switch (status) {
    case "Not Started":
      return 0;
    case "In Progress":
      return 1;
    case "Blocked":
      return 2;
    case "Completed":
      return 3;
    default:
      return neverReached(status, "Unknown task status");
  }
}

/** Most urgent first. */
export function priorityRank(priority: TaskPriority): number {
  switch (priority) {
    case "High":
      return 0;
    case "Medium":
      return 1;
    case "Low":
      return 2;
    default:
      return neverReached(priority, "Unknown task priority");
  }
}

function sortWithIdTieBreak<T extends { readonly id: number }>(
  items: readonly T[],
  compare: (a: T, b: T) => number
): T[] {
  return [...items].sort((a, b) => compare(a, b) || a.id - b.id);
}

export function sortPersons(persons: readonly Person[], key: PersonSortKey): Person[] {
  if (key === "id") return sortWithIdTieBreak(persons, () => 0);
  return sortWithIdTieBreak(persons, (a, b) => compareText(a[key], b[key]));
}

/** Milestones without a target date sort last. */
export function sortMilestones(milestones: readonly Milestone[], key: MilestoneSortKey): Milestone[] {
  switch (key) {
    case "id":
      return sortWithIdTieBreak(milestones, () => 0);
    case "name":
      return sortWithIdTieBreak(milestones, (a, b) => compareText(a.name, b.name));
    case "targetDate":
      return sortWithIdTieBreak(milestones, (a, b) => {
        if (a.targetDate === b.targetDate) return 0;
        if (a.targetDate === null) return 1;
        if (b.targetDate === null) return -1;
        return compareText(a.targetDate, b.targetDate);
      });
    default:
      return neverReached(key, "Unknown milestone sort key");
  }
}

export function sortTasks(tasks: readonly Task[], key: TaskSortKey): Task[] {
  switch (key) {
    case "id":
      return sortWithIdTieBreak(tasks, () => 0);
    case "title":
    case "startDate":
    case "dueDate":
      return sortWithIdTieBreak(tasks, (a, b) => compareText(a[key], b[key]));
    case "status":
      return sortWithIdTieBreak(tasks, (a, b) => statusRank(a.status) - statusRank(b.status));
    case "priority":
      return sortWithIdTieBreak(tasks, (a, b) => priorityRank(a.priority) - priorityRank(b.priority));
    default:
      return neverReached(key, "Unknown task sort key");
  }
}
