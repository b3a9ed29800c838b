/**
 * Repository layer over a Store.
 * Maps rows to entities, enforces uniqueness and reference invariants,
 * reports every outcome to the injected EventReporter.
 */

import type { EntityKind, MilestoneId, PersonId, TaskId } from "./core.js";
import {
  createMilestone,
  createPerson,
  createTask,
  type Milestone,
  type Person,
  type Task,
} from "./entities.js";
import {
  DanglingReferenceError,
  NotFoundError,
  StorageError,
  ValidationError,
  type RepositoryError,
} from "./errors.js";
import type { EventReporter, RepositoryOperation } from "./events.js";
import { silentReporter } from "./events.js";
import { filterTasks, sortMilestones, sortPersons, sortTasks } from "./filter.js";
import type {
  MilestoneRepo,
  MilestoneTaskQuery,
  PersonRepo,
  ProjectRepository,
  RepoResult,
  TaskRepo,
} from "./repositories.js";
import { err, ok, type Result } from "./result.js";
import type { MilestoneRow, PersonRow, Store, Tables, TaskRow } from "./store.js";

export interface ProjectRepositoryDeps {
  store: Store;
  reporter?: EventReporter;
}

// --- Row mapping ---

function personToRow(p: Person): PersonRow {
  return { id: p.id, name: p.name, email: p.email, role: p.role };
}

function milestoneToRow(m: Milestone): MilestoneRow {
  return { id: m.id, name: m.name, target_date: m.targetDate };
}

function taskToRow(t: Task): TaskRow {
  return {
    id: t.id,
    title: t.title,
    description: t.description,
    status: t.status,
    priority: t.priority,
    start_date: t.startDate,
    due_date: t.dueDate,
    person_id: t.assigneeId,
    milestone_id: t.milestoneId,
  };
}

/** A stored row that no longer validates means the store is corrupt. */
function fromRow<E>(entity: EntityKind, id: number, result: Result<E, ValidationError>): E {
  if (!result.ok) {
    throw new StorageError(`Stored ${entity} ${id} is corrupt: ${result.error.message}`, result.error);
  }
  return result.value;
}

function rowToPerson(row: PersonRow): Person {
  return fromRow("person", row.id, createPerson(row));
}

function rowToMilestone(row: MilestoneRow): Milestone {
  return fromRow(
    "milestone",
    row.id,
    createMilestone({ id: row.id, name: row.name, targetDate: row.target_date })
  );
}

function rowToTask(row: TaskRow): Task {
  return fromRow(
    "task",
    row.id,
    createTask({
      id: row.id,
      title: row.title,
      description: row.description,
      status: row.status,
      priority: row.priority,
      startDate: row.start_date,
      dueDate: row.due_date,
      assigneeId: row.person_id,
      milestoneId: row.milestone_id,
    })
  );
}

function notFound(entity: EntityKind, id: number): NotFoundError {
  return new NotFoundError(`${entity} ${id} not found`, { entity, id });
}

function checkReferences(tables: Tables, task: Task): DanglingReferenceError | null {
  if (task.assigneeId !== null && !tables.person.some((r) => r.id === task.assigneeId)) {
    return new DanglingReferenceError("assigneeId", task.assigneeId);
  }
  if (task.milestoneId !== null && !tables.milestone.some((r) => r.id === task.milestoneId)) {
    return new DanglingReferenceError("milestoneId", task.milestoneId);
  }
  return null;
}

function emailTaken(tables: Tables, email: string, exceptId?: number): ValidationError | null {
  if (tables.person.some((r) => r.email === email && r.id !== exceptId)) {
    return new ValidationError("email", "email already in use", { email });
  }
  return null;
}

export function createProjectRepository(deps: ProjectRepositoryDeps): ProjectRepository {
  const { store } = deps;
  const reporter = deps.reporter ?? silentReporter;

  function reportFailure(entity: EntityKind, operation: RepositoryOperation, error: RepositoryError): void {
    if (error instanceof ValidationError) {
      reporter.report({ type: "ValidationRejected", entity, operation, field: error.field, message: error.message });
    } else if (error instanceof DanglingReferenceError) {
      reporter.report({
        type: "ReferenceRejected",
        entity,
        operation,
        field: error.field,
        referencedId: error.referencedId,
      });
    } else if (error instanceof StorageError) {
      reporter.report({ type: "StorageFault", entity, operation, message: error.message });
    }
  }

  /** Runs one operation; any throw becomes a StorageError result. */
  function run<T>(entity: EntityKind, operation: RepositoryOperation, fn: () => RepoResult<T>): RepoResult<T> {
    let result: RepoResult<T>;
    try {
      result = fn();
    } catch (e: unknown) {
      const storageError =
        e instanceof StorageError
          ? e
          : new StorageError(`${entity} ${operation} failed: ${e instanceof Error ? e.message : String(e)}`, e);
      result = err(storageError);
    }
    if (!result.ok) reportFailure(entity, operation, result.error);
    return result;
  }

  const persons: PersonRepo = {
    create(draft) {
      return run("person", "create", () => {
        const result = store.transaction<PersonId, RepositoryError>((tables) => {
          const person = createPerson({ ...draft, id: tables.sequence.person + 1 });
          if (!person.ok) return person;
          const taken = emailTaken(tables, person.value.email);
          if (taken) return err(taken);
          tables.sequence.person = person.value.id;
          tables.person.push(personToRow(person.value));
          return ok(person.value.id);
        });
        if (result.ok) reporter.report({ type: "EntityCreated", entity: "person", id: result.value });
        return result;
      });
    },

    read(id) {
      return run("person", "read", () =>
        store.read<RepoResult<Person>>((tables) => {
          const row = tables.person.find((r) => r.id === id);
          return row ? ok(rowToPerson(row)) : err(notFound("person", id));
        })
      );
    },

    list(sortBy) {
      return run("person", "list", () => {
        const all = store.read((tables) => tables.person.map(rowToPerson));
        return ok(sortBy ? sortPersons(all, sortBy) : all);
      });
    },

    update(id, patch) {
      return run("person", "update", () => {
        const result = store.transaction<Person, RepositoryError>((tables) => {
          const index = tables.person.findIndex((r) => r.id === id);
          const row = tables.person[index];
          if (!row) return err(notFound("person", id));
          const current = rowToPerson(row);
          const next = createPerson({
            id,
            name: patch.name ?? current.name,
            email: patch.email ?? current.email,
            role: patch.role ?? current.role,
          });
          if (!next.ok) return next;
          const taken = emailTaken(tables, next.value.email, id);
          if (taken) return err(taken);
          tables.person[index] = personToRow(next.value);
          return ok(next.value);
        });
        if (result.ok) reporter.report({ type: "EntityUpdated", entity: "person", id });
        return result;
      });
    },

    delete(id) {
      return run("person", "delete", () => {
        const result = store.transaction<number[], RepositoryError>((tables) => {
          const index = tables.person.findIndex((r) => r.id === id);
          if (index === -1) return err(notFound("person", id));
          tables.person.splice(index, 1);
          const cleared: number[] = [];
          for (const task of tables.task) {
            if (task.person_id === id) {
              task.person_id = null;
              cleared.push(task.id);
            }
          }
          return ok(cleared);
        });
        if (!result.ok) return result;
        reporter.report({ type: "EntityDeleted", entity: "person", id, clearedTaskIds: result.value });
        return ok(undefined);
      });
    },
  };

  const milestones: MilestoneRepo = {
    create(draft) {
      return run("milestone", "create", () => {
        const result = store.transaction<MilestoneId, RepositoryError>((tables) => {
          const milestone = createMilestone({ ...draft, id: tables.sequence.milestone + 1 });
          if (!milestone.ok) return milestone;
          tables.sequence.milestone = milestone.value.id;
          tables.milestone.push(milestoneToRow(milestone.value));
          return ok(milestone.value.id);
        });
        if (result.ok) reporter.report({ type: "EntityCreated", entity: "milestone", id: result.value });
        return result;
      });
    },

    read(id) {
      return run("milestone", "read", () =>
        store.read<RepoResult<Milestone>>((tables) => {
          const row = tables.milestone.find((r) => r.id === id);
          return row ? ok(rowToMilestone(row)) : err(notFound("milestone", id));
        })
      );
    },

    list(sortBy) {
      return run("milestone", "list", () => {
        const all = store.read((tables) => tables.milestone.map(rowToMilestone));
        return ok(sortBy ? sortMilestones(all, sortBy) : all);
      });
    },

    update(id, patch) {
      return run("milestone", "update", () => {
        const result = store.transaction<Milestone, RepositoryError>((tables) => {
          const index = tables.milestone.findIndex((r) => r.id === id);
          const row = tables.milestone[index];
          if (!row) return err(notFound("milestone", id));
          const current = rowToMilestone(row);
          const next = createMilestone({
            id,
            name: patch.name ?? current.name,
            targetDate: patch.targetDate === undefined ? current.targetDate : patch.targetDate,
          });
          if (!next.ok) return next;
          tables.milestone[index] = milestoneToRow(next.value);
          return ok(next.value);
        });
        if (result.ok) reporter.report({ type: "EntityUpdated", entity: "milestone", id });
        return result;
      });
    },

    delete(id) {
      return run("milestone", "delete", () => {
        const result = store.transaction<number[], RepositoryError>((tables) => {
          const index = tables.milestone.findIndex((r) => r.id === id);
          if (index === -1) return err(notFound("milestone", id));
          tables.milestone.splice(index, 1);
          const cleared: number[] = [];
          for (const task of tables.task) {
            if (task.milestone_id === id) {
              task.milestone_id = null;
              cleared.push(task.id);
            }
          }
          return ok(cleared);
        });
        if (!result.ok) return result;
        reporter.report({ type: "EntityDeleted", entity: "milestone", id, clearedTaskIds: result.value });
        return ok(undefined);
      });
    },
  };

  function listTasks(): Task[] {
    return store.read((tables) => tables.task.map(rowToTask));
  }

  const tasks: TaskRepo = {
    create(draft) {
      return run("task", "create", () => {
        const result = store.transaction<TaskId, RepositoryError>((tables) => {
          const task = createTask({ ...draft, id: tables.sequence.task + 1 });
          if (!task.ok) return task;
          const dangling = checkReferences(tables, task.value);
          if (dangling) return err(dangling);
          tables.sequence.task = task.value.id;
          tables.task.push(taskToRow(task.value));
          return ok(task.value.id);
        });
        if (result.ok) reporter.report({ type: "EntityCreated", entity: "task", id: result.value });
        return result;
      });
    },

    read(id) {
      return run("task", "read", () =>
        store.read<RepoResult<Task>>((tables) => {
          const row = tables.task.find((r) => r.id === id);
          return row ? ok(rowToTask(row)) : err(notFound("task", id));
        })
      );
    },

    list(sortBy) {
      return run("task", "list", () => {
        const all = listTasks();
        return ok(sortBy ? sortTasks(all, sortBy) : all);
      });
    },

    update(id, patch) {
      return run("task", "update", () => {
        const result = store.transaction<Task, RepositoryError>((tables) => {
          const index = tables.task.findIndex((r) => r.id === id);
          const row = tables.task[index];
          if (!row) return err(notFound("task", id));
          const current = rowToTask(row);
          const next = createTask({
            id,
            title: patch.title ?? current.title,
            description: patch.description ?? current.description,
            status: patch.status ?? current.status,
            priority: patch.priority ?? current.priority,
            startDate: patch.startDate ?? current.startDate,
            dueDate: patch.dueDate ?? current.dueDate,
            assigneeId: patch.assigneeId === undefined ? current.assigneeId : patch.assigneeId,
            milestoneId: patch.milestoneId === undefined ? current.milestoneId : patch.milestoneId,
          });
          if (!next.ok) return next;
          const dangling = checkReferences(tables, next.value);
          if (dangling) return err(dangling);
          tables.task[index] = taskToRow(next.value);
          return ok(next.value);
        });
        if (result.ok) reporter.report({ type: "EntityUpdated", entity: "task", id });
        return result;
      });
    },

    delete(id) {
      return run("task", "delete", () => {
        const result = store.transaction<TaskId, RepositoryError>((tables) => {
          const index = tables.task.findIndex((r) => r.id === id);
          if (index === -1) return err(notFound("task", id));
          tables.task.splice(index, 1);
          return ok(id);
        });
        if (!result.ok) return result;
        reporter.report({ type: "EntityDeleted", entity: "task", id, clearedTaskIds: [] });
        return ok(undefined);
      });
    },

    listByMilestone(milestoneId, query: MilestoneTaskQuery = {}) {
      return run("task", "list", () => {
        const exists = store.read((tables) => tables.milestone.some((r) => r.id === milestoneId));
        if (!exists) return err(notFound("milestone", milestoneId));
        const matching = filterTasks(listTasks(), {
          milestoneId,
          ...(query.status !== undefined && { status: query.status }),
          ...(query.priority !== undefined && { priority: query.priority }),
        });
        return ok(sortTasks(matching, query.sortBy ?? "dueDate"));
      });
    },

    listByAssignee(personId) {
      return run("task", "list", () => {
        const exists = store.read((tables) => tables.person.some((r) => r.id === personId));
        if (!exists) return err(notFound("person", personId));
        return ok(filterTasks(listTasks(), { assigneeId: personId }));
      });
    },
  };

  return { persons, milestones, tasks };
}
