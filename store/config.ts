/**
 * Runtime configuration from environment variables.
 * TRACKER_STORE=memory|file, TRACKER_STORE_PATH, TRACKER_LOG=console|silent.
 */

import path from "node:path";
import { ValidationError } from "../domain/errors.js";
import { err, ok, type Result } from "../domain/result.js";

export type StoreKind = "memory" | "file";
export type LogKind = "console" | "silent";

export interface TrackerConfig {
  readonly store: StoreKind;
  /** Absolute path of the JSON store file. Used when store is "file". */
  readonly storePath: string;
  readonly log: LogKind;
}

export const DEFAULT_STORE_PATH = "./data/tracker.json";

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): Result<TrackerConfig, ValidationError> {
  const store = env.TRACKER_STORE ?? "file";
  if (store !== "memory" && store !== "file") {
    return err(new ValidationError("TRACKER_STORE", 'TRACKER_STORE must be "memory" or "file"', { value: store }));
  }
  const log = env.TRACKER_LOG ?? "console";
  if (log !== "console" && log !== "silent") {
    return err(new ValidationError("TRACKER_LOG", 'TRACKER_LOG must be "console" or "silent"', { value: log }));
  }
  const storePath = path.resolve(env.TRACKER_STORE_PATH ?? DEFAULT_STORE_PATH);
  return ok({ store, storePath, log });
}
