import { describe, expect, it, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, readFileSync, existsSync, writeFileSync, mkdirSync } from "node:fs";
import path from "node:path";
import os from "node:os";
import { FileStore, parseTables } from "./fileStore.js";
import { createProjectRepository } from "../domain/projectRepository.js";
import { RecordingReporter } from "../domain/events.js";
import { StorageError } from "../domain/errors.js";
import { emptyTables } from "../domain/store.js";

describe("FileStore", () => {
  let rootDir: string;
  let file: string;

  beforeEach(() => {
    rootDir = mkdtempSync(path.join(os.tmpdir(), "tracker-"));
    file = path.join(rootDir, "nested", "tracker.json");
  });

  afterEach(() => {
    rmSync(rootDir, { recursive: true, force: true });
  });

  it("missing file reads as empty tables", () => {
    const store = new FileStore(file);
    expect(store.read((tables) => tables)).toEqual(emptyTables());
    expect(existsSync(file)).toBe(false);
  });

  it("data survives reopening the file", () => {
    const first = createProjectRepository({ store: new FileStore(file) });
    const ada = first.persons.create({ name: "Ada", email: "ada@example.test" });
    expect(ada.ok).toBe(true);
    if (!ada.ok) return;
    const task = first.tasks.create({
      title: "Plan",
      startDate: "2025-01-01",
      dueDate: "2025-01-02",
      assigneeId: ada.value,
    });
    expect(task.ok).toBe(true);

    const second = createProjectRepository({ store: new FileStore(file) });
    const tasks = second.tasks.list();
    expect(tasks.ok && tasks.value.map((t) => [t.title, t.assigneeId])).toEqual([["Plan", ada.value]]);
    expect(existsSync(`${file}.tmp`)).toBe(false);
  });

  it("stores rows as snake_case tables", () => {
    const repo = createProjectRepository({ store: new FileStore(file) });
    repo.milestones.create({ name: "Beta", targetDate: "2025-03-01" });
    const doc: unknown = JSON.parse(readFileSync(file, "utf8"));
    expect(doc).toEqual({
      person: [],
      milestone: [{ id: 1, name: "Beta", target_date: "2025-03-01" }],
      task: [],
      sequence: { person: 0, milestone: 1, task: 0 },
    });
  });

  it("a rejected write leaves the file untouched", () => {
    const repo = createProjectRepository({ store: new FileStore(file) });
    repo.persons.create({ name: "Ada", email: "ada@example.test" });
    const before = readFileSync(file, "utf8");
    const result = repo.persons.create({ name: "Bob", email: "not-an-email" });
    expect(result.ok).toBe(false);
    expect(readFileSync(file, "utf8")).toBe(before);
  });

  it("invalid JSON surfaces as a StorageError result", () => {
    mkdirSync(path.dirname(file), { recursive: true });
    writeFileSync(file, "{ not json", "utf8");
    const reporter = new RecordingReporter();
    const repo = createProjectRepository({ store: new FileStore(file), reporter });

    const result = repo.persons.list();
    expect(!result.ok && result.error).toBeInstanceOf(StorageError);
    expect(!result.ok && result.error.message).toBe("Invalid JSON in store file");
    expect(reporter.events).toEqual([
      { type: "StorageFault", entity: "person", operation: "list", message: "Invalid JSON in store file" },
    ]);
  });

  it("a stale sequence is reported instead of reusing an id", () => {
    mkdirSync(path.dirname(file), { recursive: true });
    const doc = {
      person: [{ id: 5, name: "Ada", email: "ada@example.test", role: "" }],
      milestone: [],
      task: [],
      sequence: { person: 4, milestone: 0, task: 0 },
    };
    writeFileSync(file, JSON.stringify(doc), "utf8");
    const repo = createProjectRepository({ store: new FileStore(file) });

    const result = repo.persons.create({ name: "Bob", email: "bob@example.test" });
    expect(!result.ok && result.error).toBeInstanceOf(StorageError);
    expect(JSON.parse(readFileSync(file, "utf8"))).toEqual(doc);
  });

  it("unreadable path surfaces as a StorageError result", () => {
    // A directory where the file should be.
    mkdirSync(file, { recursive: true });
    const repo = createProjectRepository({ store: new FileStore(file) });
    const result = repo.tasks.create({ title: "Plan", startDate: "2025-01-01", dueDate: "2025-01-02" });
    expect(!result.ok && result.error).toBeInstanceOf(StorageError);
  });
});

describe("parseTables", () => {
  it("rejects documents with the wrong shape", () => {
    expect(() => parseTables([])).toThrow("Invalid store file: not an object");
    expect(() => parseTables({ person: [], milestone: [], task: [] })).toThrow(
      "Invalid store file: sequence is missing"
    );
    expect(() =>
      parseTables({
        person: [{ id: "1", name: "Ada", email: "a@b", role: "" }],
        milestone: [],
        task: [],
        sequence: { person: 1, milestone: 0, task: 0 },
      })
    ).toThrow("Invalid row shape in table person");
  });

  it("rejects a sequence that has fallen behind its rows", () => {
    expect(() =>
      parseTables({
        person: [{ id: 5, name: "Ada", email: "a@b", role: "" }],
        milestone: [],
        task: [],
        sequence: { person: 4, milestone: 0, task: 0 },
      })
    ).toThrow("Invalid store file: sequence behind rows in table person");
  });

  it("rejects duplicate ids", () => {
    expect(() =>
      parseTables({
        person: [],
        milestone: [
          { id: 2, name: "Alpha", target_date: null },
          { id: 2, name: "Beta", target_date: null },
        ],
        task: [],
        sequence: { person: 0, milestone: 2, task: 0 },
      })
    ).toThrow("Invalid store file: duplicate id 2 in table milestone");
  });

  it("accepts a well-formed document", () => {
    const doc = {
      person: [{ id: 1, name: "Ada", email: "a@b", role: "" }],
      milestone: [{ id: 1, name: "Beta", target_date: null }],
      task: [],
      sequence: { person: 1, milestone: 1, task: 0 },
    };
    expect(parseTables(doc)).toEqual(doc);
  });
});
