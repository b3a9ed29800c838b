/**
 * Store abstraction: three tables of rows plus id sequences.
 * No business logic. Writes are all-or-nothing per transaction.
 */

import type { DomainError } from "./errors.js";
import type { Result } from "./result.js";

export interface PersonRow {
  id: number;
  name: string;
  email: string;
  role: string;
}

export interface MilestoneRow {
  id: number;
  name: string;
  target_date: string | null;
}

export interface TaskRow {
  id: number;
  title: string;
  description: string;
  status: string;
  priority: string;
  start_date: string;
  due_date: string;
  person_id: number | null;
  milestone_id: number | null;
}

/** Last identifier handed out per table. Never decremented. */
export interface Sequences {
  person: number;
  milestone: number;
  task: number;
}

export interface Tables {
  person: PersonRow[];
  milestone: MilestoneRow[];
  task: TaskRow[];
  sequence: Sequences;
}

export function emptyTables(): Tables {
  return {
    person: [],
    milestone: [],
    task: [],
    sequence: { person: 0, milestone: 0, task: 0 },
  };
}

export function cloneTables(tables: Tables): Tables {
  return structuredClone(tables);
}

/**
 * Synchronous store interface.
 * `read` must not mutate. `transaction` works on a private copy and commits it
 * only when the callback returns an ok result; an error result or a throw
 * leaves the stored tables as they were.
 */
export interface Store {
  read<T>(fn: (tables: Tables) => T): T;
  transaction<T, E extends DomainError>(fn: (tables: Tables) => Result<T, E>): Result<T, E>;
}

/** In-memory adapter. For tests and throwaway sessions. */
export class InMemoryStore implements Store {
  private tables: Tables;

  constructor(initial: Tables = emptyTables()) {
    this.tables = cloneTables(initial);
  }

  read<T>(fn: (tables: Tables) => T): T {
    return fn(this.tables);
  }

  transaction<T, E extends DomainError>(fn: (tables: Tables) => Result<T, E>): Result<T, E> {
    const draft = cloneTables(this.tables);
    const result = fn(draft);
    if (result.ok) this.tables = draft;
    return result;
  }

  /** Reset for tests. Not on Store interface. */
  clear(): void {
    this.tables = emptyTables();
  }
}
