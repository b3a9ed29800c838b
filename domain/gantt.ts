/**
 * Domain gantt: one row per task, dates mapped onto [0, 1].
 * Pure. Output depends only on the input tasks and options.
 */

import type { DateOnly, TaskId } from "./core.js";
import {
  daysBetween,
  eachDay,
  formatDay,
  isDateOnly,
  isMonthStart,
  isWeekStart,
  maxDate,
  minDate,
  shiftDays,
  toDateOnly,
} from "./dates.js";
import type { Task, TaskPriority, TaskStatus } from "./entities.js";
import { ValidationError } from "./errors.js";
import { err, ok, type Result } from "./result.js";
import { neverReached } from "./validation.js";

/** Inclusive date window shown on the timeline. */
export interface DateRange {
  readonly start: DateOnly;
  readonly end: DateOnly;
}

export type BarPattern = "solid" | "hatched" | "dotted";

/** One timeline bar. */
export interface GanttRow {
  readonly taskId: TaskId;
  /** 0-based, equal to the row's position in the output. */
  readonly row: number;
  /** Fraction of the range span where the bar starts. */
  readonly offset: number;
  /** Fraction of the range span the bar covers. */
  readonly width: number;
  readonly color: string;
  readonly pattern: BarPattern;
}

export interface GanttLayout {
  readonly range: DateRange;
  readonly rows: readonly GanttRow[];
}

export interface GanttOptions {
  /** Window to draw. Defaults to the tasks' own extent. */
  readonly range?: DateRange;
  /** Narrowest bar, as a fraction of the span. Default 0.02. */
  readonly minWidth?: number;
  /** Anchor for the fallback range when there are no tasks. Defaults to the current date. */
  readonly today?: DateOnly;
}

export const DEFAULT_MIN_WIDTH = 0.02;

export function statusColor(status: TaskStatus): string {
  switch (status) {
    case "Not Started":
      return "#95a5a6";
    case "In Progress":
      return "#3498db";
    case "Completed":
      return "#2ecc71";
    case "Blocked":
      return "#e74c3c";
    default:
      return neverReached(status, "Unknown task status");
  }
}

export function priorityPattern(priority: TaskPriority): BarPattern {
  switch (priority) {
    case "High":
      return "solid";
    case "Medium":
      return "hatched";
    case "Low":
      return "dotted";
    default:
      return neverReached(priority, "Unknown task priority");
  }
}

/**
 * Range covering every task: earliest start to latest due.
 * Never zero-length; with no tasks it is [today, today + 1].
 */
export function deriveRange(tasks: readonly Task[], today: DateOnly): DateRange {
  if (tasks.length === 0) return { start: today, end: shiftDays(today, 1) };
  let start = tasks[0]?.startDate ?? today;
  let end = tasks[0]?.dueDate ?? today;
  for (const t of tasks) {
    start = minDate(start, t.startDate);
    end = maxDate(end, t.dueDate);
  }
  return start === end ? { start, end: shiftDays(end, 1) } : { start, end };
}

function checkRange(range: DateRange): ValidationError | null {
  if (!isDateOnly(range.start) || !isDateOnly(range.end)) {
    return new ValidationError("range", "range bounds must be dates in YYYY-MM-DD form", { ...range });
  }
  if (range.end < range.start) {
    return new ValidationError("range", "range end must not be earlier than its start", { ...range });
  }
  return null;
}

function clamp01(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function byStartThenId(a: Task, b: Task): number {
  if (a.startDate !== b.startDate) return a.startDate < b.startDate ? -1 : 1;
  return a.id - b.id;
}

/**
 * Lays out tasks on a timeline.
 * Tasks wholly outside the range are dropped; partial overlaps are clipped.
 * Zero-width bars are raised to `minWidth`, pulling the offset back if needed
 * so that offset + width stays within 1.
 */
export function layoutGantt(
  tasks: readonly Task[],
  options: GanttOptions = {}
): Result<GanttLayout, ValidationError> {
  const minWidth = options.minWidth ?? DEFAULT_MIN_WIDTH;
  if (!(minWidth >= 0 && minWidth <= 1)) {
    return err(new ValidationError("minWidth", "minWidth must be between 0 and 1", { minWidth }));
  }

  let range = options.range ?? deriveRange(tasks, options.today ?? toDateOnly(new Date()));
  const rangeError = checkRange(range);
  if (rangeError) return err(rangeError);
  if (range.start === range.end) range = { start: range.start, end: shiftDays(range.end, 1) };

  const span = daysBetween(range.start, range.end);
  const visible = tasks
    .filter((t) => t.dueDate >= range.start && t.startDate <= range.end)
    .sort(byStartThenId);

  const rows = visible.map((task, row): GanttRow => {
    const from = clamp01(daysBetween(range.start, task.startDate) / span);
    const to = clamp01(daysBetween(range.start, task.dueDate) / span);
    const width = Math.max(to - from, minWidth);
    const offset = Math.min(from, 1 - width);
    return {
      taskId: task.id,
      row,
      offset,
      width,
      color: statusColor(task.status),
      pattern: priorityPattern(task.priority),
    };
  });

  return ok({ range, rows });
}

// --- Date axis ---

export type AxisUnit = "day" | "week" | "month";

export interface AxisTick {
  readonly date: DateOnly;
  readonly offset: number;
  readonly label: string;
}

function isTickDay(date: DateOnly, unit: AxisUnit): boolean {
  switch (unit) {
    case "day":
      return true;
    case "week":
      return isWeekStart(date);
    case "month":
      return isMonthStart(date);
    default:
      return neverReached(unit, "Unknown axis unit");
  }
}

function tickLabel(date: DateOnly, unit: AxisUnit): string {
  return formatDay(date, unit === "month" ? "MMM yyyy" : "MMM d");
}

/**
 * Axis ticks inside the range: every day, every Monday, or every first of
 * the month. Offsets use the same mapping as the bars. A zero-day range has
 * no ticks.
 */
export function axisTicks(range: DateRange, unit: AxisUnit): Result<AxisTick[], ValidationError> {
  const rangeError = checkRange(range);
  if (rangeError) return err(rangeError);
  const span = daysBetween(range.start, range.end);
  if (span === 0) return ok([]);
  const ticks: AxisTick[] = [];
  for (const date of eachDay(range.start, range.end)) {
    if (!isTickDay(date, unit)) continue;
    ticks.push({ date, offset: daysBetween(range.start, date) / span, label: tickLabel(date, unit) });
  }
  return ok(ticks);
}
