/**
 * File-backed store. One JSON document holding all three tables.
 * Every transaction re-reads the file and replaces it atomically (tmp + rename).
 */

import { mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import path from "node:path";
import { StorageError } from "../domain/errors.js";
import type { DomainError } from "../domain/errors.js";
import type { Result } from "../domain/result.js";
import {
  emptyTables,
  type MilestoneRow,
  type PersonRow,
  type Sequences,
  type Store,
  type Tables,
  type TaskRow,
} from "../domain/store.js";

function hasErrorCode(e: unknown, code: string): boolean {
  return e instanceof Error && "code" in e && e.code === code;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isId(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value);
}

function isNullableId(value: unknown): value is number | null {
  return value === null || isId(value);
}

function isPersonRow(value: unknown): value is PersonRow {
  return (
    isRecord(value) &&
    isId(value.id) &&
    typeof value.name === "string" &&
    typeof value.email === "string" &&
    typeof value.role === "string"
  );
}

function isMilestoneRow(value: unknown): value is MilestoneRow {
  return (
    isRecord(value) &&
    isId(value.id) &&
    typeof value.name === "string" &&
    (value.target_date === null || typeof value.target_date === "string")
  );
}

function isTaskRow(value: unknown): value is TaskRow {
  return (
    isRecord(value) &&
    isId(value.id) &&
    typeof value.title === "string" &&
    typeof value.description === "string" &&
    typeof value.status === "string" &&
    typeof value.priority === "string" &&
    typeof value.start_date === "string" &&
    typeof value.due_date === "string" &&
    isNullableId(value.person_id) &&
    isNullableId(value.milestone_id)
  );
}

function isSequences(value: unknown): value is Sequences {
  return isRecord(value) && isId(value.person) && isId(value.milestone) && isId(value.task);
}

function rowsOf<R>(doc: Record<string, unknown>, table: string, guard: (v: unknown) => v is R): R[] {
  const rows = doc[table];
  if (!Array.isArray(rows)) {
    throw new StorageError(`Invalid store file: table ${table} is missing`);
  }
  const result: R[] = [];
  for (const row of rows) {
    if (!guard(row)) throw new StorageError(`Invalid row shape in table ${table}`);
    result.push(row);
  }
  return result;
}

/** Ids are unique per table and never above the table's sequence. */
function checkIds(table: keyof Sequences, rows: readonly { id: number }[], sequence: Sequences): void {
  const seen = new Set<number>();
  for (const row of rows) {
    if (seen.has(row.id)) {
      throw new StorageError(`Invalid store file: duplicate id ${row.id} in table ${table}`);
    }
    if (row.id > sequence[table]) {
      throw new StorageError(`Invalid store file: sequence behind rows in table ${table}`);
    }
    seen.add(row.id);
  }
}

/** Shape and id check of a parsed store document. Throws StorageError on mismatch. */
export function parseTables(doc: unknown): Tables {
  if (!isRecord(doc)) throw new StorageError("Invalid store file: not an object");
  if (!isSequences(doc.sequence)) throw new StorageError("Invalid store file: sequence is missing");
  const tables: Tables = {
    person: rowsOf(doc, "person", isPersonRow),
    milestone: rowsOf(doc, "milestone", isMilestoneRow),
    task: rowsOf(doc, "task", isTaskRow),
    sequence: { ...doc.sequence },
  };
  checkIds("person", tables.person, tables.sequence);
  checkIds("milestone", tables.milestone, tables.sequence);
  checkIds("task", tables.task, tables.sequence);
  return tables;
}

export class FileStore implements Store {
  private readonly file: string;

  constructor(file: string) {
    this.file = file;
  }

  private load(): Tables {
    let text: string;
    try {
      text = readFileSync(this.file, "utf8");
    } catch (e: unknown) {
      if (hasErrorCode(e, "ENOENT")) return emptyTables();
      throw new StorageError(`Cannot read store file ${this.file}`, e);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (e: unknown) {
      throw new StorageError("Invalid JSON in store file", e);
    }
    return parseTables(parsed);
  }

  private save(tables: Tables): void {
    const tmp = `${this.file}.tmp`;
    try {
      mkdirSync(path.dirname(this.file), { recursive: true });
      writeFileSync(tmp, JSON.stringify(tables, null, 2), "utf8");
      renameSync(tmp, this.file);
    } catch (e: unknown) {
      rmSync(tmp, { force: true });
      throw new StorageError(`Cannot write store file ${this.file}`, e);
    }
  }

  read<T>(fn: (tables: Tables) => T): T {
    return fn(this.load());
  }

  transaction<T, E extends DomainError>(fn: (tables: Tables) => Result<T, E>): Result<T, E> {
    const draft = this.load();
    const result = fn(draft);
    if (result.ok) this.save(draft);
    return result;
  }
}
