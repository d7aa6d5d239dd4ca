import { join } from "node:path";
import type { StateConfig } from "../../core/domain/entities/config.entity.js";
import type { IStateStore } from "../../core/domain/repositories/state-store.repository.js";
import { JsonStateStore } from "./json-state-store.repository.js";
import {
  SqliteStateStore,
  type StateStoreOptions,
} from "./sqlite-state-store.repository.js";

export const SQLITE_FILE_NAME = "state.sqlite";

export function createStateStore(
  config: StateConfig,
  options: StateStoreOptions,
): IStateStore {
  return config.driver === "json"
    ? new JsonStateStore(config.dir, options)
    : new SqliteStateStore(join(config.dir, SQLITE_FILE_NAME), options);
}
