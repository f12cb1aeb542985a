/**
 * Task list package - a single-user task list persisted to a JSON file.
 *
 * - TaskStore: file persistence with `.bak` and timestamped backups
 * - TaskCollection: in-memory tasks, id assignment, validation and views
 * - registerTaskTools: MCP tools over the collection
 */

export { TaskStore } from "./core/TaskStore.js";
export type { TaskStoreOptions } from "./core/TaskStore.js";
export { TaskCollection } from "./core/TaskCollection.js";
export type { TaskCollectionOptions } from "./core/TaskCollection.js";
export type {
  Task,
  TaskRecord,
  TaskStatus,
  TaskView,
  TaskIdentity,
  TaskInput,
  TaskSelector,
  TaskSummary,
  LoadStatus,
  LoadReport,
  StoreStats,
} from "./core/model.js";
export { STATUS_LABELS, TASK_VIEWS } from "./core/model.js";
export { StoredRecordSchema } from "./core/schema.js";
export type { StoredRecord } from "./core/schema.js";
export {
  parseIsoDate,
  parseDeadlineInput,
  formatIsoDate,
  formatCreatedDate,
  formatBackupStamp,
  formatDeadline,
} from "./core/dates.js";
export { deriveStatus, matchesView, toTaskRow, describeTask } from "./core/status.js";
export type { TaskRow } from "./core/status.js";
export type { FileSystem, FileStats } from "./core/ports/FileSystem.js";
export { NodeFileSystem } from "./infrastructure/NodeFileSystem.js";
export { InMemoryFileSystem } from "./infrastructure/InMemoryFileSystem.js";
export type { FileOperation } from "./infrastructure/InMemoryFileSystem.js";
export { loadConfig } from "./config.js";
export type { TaskListConfig } from "./config.js";
export { createContext } from "./context.js";
export type { TaskListContext, ContextOverrides } from "./context.js";
export { registerTaskTools } from "./tools/registerTools.js";
