/**
 * Workspace wiring: store and reporter selection.
 * Swap memory or file storage without touching the domain.
 */

import type { EventReporter } from "../domain/events.js";
import { silentReporter } from "../domain/events.js";
import { createProjectRepository } from "../domain/projectRepository.js";
import type { ProjectRepository } from "../domain/repositories.js";
import { InMemoryStore, type Store } from "../domain/store.js";
import type { TrackerConfig } from "./config.js";
import { createConsoleReporter } from "./consoleReporter.js";
import { FileStore } from "./fileStore.js";

export interface Workspace {
  readonly config: TrackerConfig;
  readonly store: Store;
  readonly reporter: EventReporter;
  readonly repository: ProjectRepository;
}

function createStore(config: TrackerConfig): Store {
  if (config.store === "memory") return new InMemoryStore();
  return new FileStore(config.storePath);
}

function createReporter(config: TrackerConfig): EventReporter {
  return config.log === "console" ? createConsoleReporter() : silentReporter;
}

/** `reporter` overrides the one the config selects. */
export function createWorkspace(config: TrackerConfig, reporter?: EventReporter): Workspace {
  const store = createStore(config);
  const chosen = reporter ?? createReporter(config);
  return {
    config,
    store,
    reporter: chosen,
    repository: createProjectRepository({ store, reporter: chosen }),
  };
}
