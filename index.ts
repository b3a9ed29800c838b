/**
 * Public API for the embedding application.
 */

export * from "./domain/core.js";
export * from "./domain/errors.js";
export * from "./domain/result.js";
export * from "./domain/dates.js";
export * from "./domain/entities.js";
export * from "./domain/events.js";
export * from "./domain/store.js";
export * from "./domain/repositories.js";
export { createProjectRepository, type ProjectRepositoryDeps } from "./domain/projectRepository.js";
export * from "./domain/filter.js";
export * from "./domain/gantt.js";
export * from "./domain/milestoneCalendar.js";
export * from "./domain/exportCsv.js";
export { FileStore } from "./store/fileStore.js";
export { createConsoleReporter, formatEvent, type ReporterLogger } from "./store/consoleReporter.js";
export { loadConfig, DEFAULT_STORE_PATH, type TrackerConfig, type StoreKind, type LogKind } from "./store/config.js";
export { createWorkspace, type Workspace } from "./store/workspace.js";
