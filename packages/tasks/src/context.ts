/**
 * Application context: configuration, store and collection, built once by the
 * entry point and handed to the tools.
 */

import { createLogger, type Logger } from "@tasklist/core";
import type { TaskListConfig } from "./config.js";
import type { FileSystem } from "./core/ports/FileSystem.js";
import { TaskStore } from "./core/TaskStore.js";
import { TaskCollection } from "./core/TaskCollection.js";
import { NodeFileSystem } from "./infrastructure/NodeFileSystem.js";

export interface TaskListContext {
  config: TaskListConfig;
  store: TaskStore;
  tasks: TaskCollection;
}

export interface ContextOverrides {
  fs?: FileSystem;
  now?: () => Date;
  logger?: Logger;
}

export function createContext(config: TaskListConfig, overrides: ContextOverrides = {}): TaskListContext {
  const logger = overrides.logger ?? createLogger("tasks");
  const store = new TaskStore(config.filePath, {
    fs: overrides.fs ?? new NodeFileSystem(),
    now: overrides.now,
    logger,
  });
  const tasks = new TaskCollection(store, {
    identity: config.identity,
    now: overrides.now,
    logger,
  });
  return { config, store, tasks };
}
