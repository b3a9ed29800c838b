/**
 * Console-backed EventReporter. One line per event: message + JSON payload.
 */

import type { EventReporter, RepositoryEvent } from "../domain/events.js";
import { neverReached } from "../domain/validation.js";

/** Subset of Console the reporter writes to. */
export interface ReporterLogger {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

function summarize(event: RepositoryEvent): { level: keyof ReporterLogger; message: string } {
  switch (event.type) {
    case "EntityCreated":
      return { level: "info", message: `Created ${event.entity} ${event.id}` };
    case "EntityUpdated":
      return { level: "info", message: `Updated ${event.entity} ${event.id}` };
    case "EntityDeleted":
      return { level: "info", message: `Deleted ${event.entity} ${event.id}` };
    case "ValidationRejected":
      return { level: "warn", message: `Rejected ${event.entity} ${event.operation}: ${event.message}` };
    case "ReferenceRejected":
      return {
        level: "warn",
        message: `Rejected ${event.entity} ${event.operation}: ${event.field} ${event.referencedId} does not exist`,
      };
    case "StorageFault":
      return { level: "error", message: `Storage fault during ${event.entity} ${event.operation}: ${event.message}` };
    default:
      return neverReached(event, "Unknown repository event");
  }
}

/** Formats a single event the way the console reporter prints it. */
export function formatEvent(event: RepositoryEvent): string {
  return `${summarize(event).message} ${JSON.stringify(event)}`;
}

export function createConsoleReporter(logger: ReporterLogger = console): EventReporter {
  return {
    report(event: RepositoryEvent): void {
      const { level } = summarize(event);
      logger[level](formatEvent(event));
    },
  };
}
