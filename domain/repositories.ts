/**
 * Persistence boundaries: interfaces only.
 * Every operation is synchronous and returns a Result; nothing throws for
 * expected conditions.
 */

import type { MilestoneId, PersonId, TaskId } from "./core.js";
import type {
  Milestone,
  MilestoneDraft,
  Person,
  PersonDraft,
  Task,
  TaskDraft,
  TaskPriority,
  TaskStatus,
} from "./entities.js";
import type { RepositoryError } from "./errors.js";
import type { MilestoneSortKey, PersonSortKey, TaskSortKey } from "./filter.js";
import type { Result } from "./result.js";

export type RepoResult<T> = Result<T, RepositoryError>;

/** CRUD over one entity type. `list` is in creation order unless sorted. */
export interface EntityRepository<E, Id, Draft, Patch, SortKey> {
  create(draft: Draft): RepoResult<Id>;
  read(id: Id): RepoResult<E>;
  list(sortBy?: SortKey): RepoResult<readonly E[]>;
  update(id: Id, patch: Patch): RepoResult<E>;
  delete(id: Id): RepoResult<void>;
}

/** Fields to change. Omitted fields keep their value; `null` clears a reference. */
export type PersonPatch = Partial<PersonDraft>;
export type MilestonePatch = Partial<MilestoneDraft>;
export type TaskPatch = Partial<TaskDraft>;

export type PersonRepo = EntityRepository<Person, PersonId, PersonDraft, PersonPatch, PersonSortKey>;
export type MilestoneRepo = EntityRepository<
  Milestone,
  MilestoneId,
  MilestoneDraft,
  MilestonePatch,
  MilestoneSortKey
>;

export interface MilestoneTaskQuery {
  readonly status?: TaskStatus;
  readonly priority?: TaskPriority;
  /** Defaults to dueDate. */
  readonly sortBy?: TaskSortKey;
}

export interface TaskRepo extends EntityRepository<Task, TaskId, TaskDraft, TaskPatch, TaskSortKey> {
  /** Tasks linked to a milestone. NotFoundError when the milestone is absent. */
  listByMilestone(milestoneId: MilestoneId, query?: MilestoneTaskQuery): RepoResult<readonly Task[]>;
  /** Tasks assigned to a person. NotFoundError when the person is absent. */
  listByAssignee(personId: PersonId): RepoResult<readonly Task[]>;
}

/** Repository for the whole project: one sub-repository per entity type. */
export interface ProjectRepository {
  readonly persons: PersonRepo;
  readonly milestones: MilestoneRepo;
  readonly tasks: TaskRepo;
}
