/**
 * Task export: comma-separated text, header row first.
 * Builds the buffer only; writing it anywhere is the caller's job.
 */

import type { Milestone, Person, Task } from "./entities.js";

export const CSV_HEADER = [
  "Title",
  "Status",
  "Priority",
  "Start Date",
  "Due Date",
  "Assignee",
  "Milestone",
] as const;

/** Shown when a reference is null or does not resolve. */
export const MISSING_NAME = "None";

export interface ExportLookups {
  readonly persons: readonly Person[];
  readonly milestones: readonly Milestone[];
}

/** Quotes a field containing a comma, quote, CR or LF; doubles inner quotes. */
export function escapeCsvField(value: string): string {
  if (!/[",\r\n]/.test(value)) return value;
  return `"${value.replace(/"/g, '""')}"`;
}

function toLine(fields: readonly string[]): string {
  return fields.map(escapeCsvField).join(",");
}

export function exportTasksCsv(tasks: readonly Task[], lookups: ExportLookups): string {
  const personNames = new Map(lookups.persons.map((p) => [p.id, p.name] as const));
  const milestoneNames = new Map(lookups.milestones.map((m) => [m.id, m.name] as const));

  const lines = [toLine(CSV_HEADER)];
  for (const task of tasks) {
    const assignee = task.assigneeId === null ? undefined : personNames.get(task.assigneeId);
    const milestone = task.milestoneId === null ? undefined : milestoneNames.get(task.milestoneId);
    lines.push(
      toLine([
        task.title,
        task.status,
        task.priority,
        task.startDate,
        task.dueDate,
        assignee ?? MISSING_NAME,
        milestone ?? MISSING_NAME,
      ])
    );
  }
  return lines.join("\n") + "\n";
}
