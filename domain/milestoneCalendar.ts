/**
 * Milestone calendar: which milestone work falls on which day.
 * Every day from a linked task's start to its due date carries an entry.
 */

import type { DateOnly, MilestoneId } from "./core.js";
import { eachDay } from "./dates.js";
import type { Milestone, Task } from "./entities.js";
import { filterByText } from "./filter.js";

export interface CalendarEntry {
  readonly milestoneId: MilestoneId;
  readonly milestoneName: string;
  readonly taskTitle: string;
}

export type MilestoneCalendar = ReadonlyMap<DateOnly, readonly CalendarEntry[]>;

/**
 * Builds the calendar. `filterText` keeps milestones whose name contains it
 * (case-insensitive). Tasks pointing at an unknown milestone are skipped.
 * Entries within a day follow task order.
 */
export function milestoneCalendar(
  tasks: readonly Task[],
  milestones: readonly Milestone[],
  filterText = ""
): MilestoneCalendar {
  const shown = new Map(
    filterByText(milestones, filterText, { field: "name" }).map((m) => [m.id, m] as const)
  );
  const days = new Map<DateOnly, CalendarEntry[]>();

  for (const task of tasks) {
    if (task.milestoneId === null) continue;
    const milestone = shown.get(task.milestoneId);
    if (!milestone) continue;
    const entry: CalendarEntry = {
      milestoneId: milestone.id,
      milestoneName: milestone.name,
      taskTitle: task.title,
    };
    for (const day of eachDay(task.startDate, task.dueDate)) {
      const list = days.get(day) ?? [];
      list.push(entry);
      days.set(day, list);
    }
  }
  return days;
}

/** Entries for one day; empty when nothing is scheduled. */
export function milestonesOn(calendar: MilestoneCalendar, date: DateOnly): readonly CalendarEntry[] {
  return calendar.get(date) ?? [];
}
