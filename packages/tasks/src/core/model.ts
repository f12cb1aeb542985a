/**
 * Task model types.
 */

/**
 * A task in the collection.
 * Mutated in place by edits and toggles; `id` and `createdDate` never change.
 */
export interface Task {
  /** Sequential identifier; null only for records written without one */
  id: number | null;
  title: string;
  description: string;
  /** Calendar date as YYYY-MM-DD */
  deadline: string | null;
  completed: boolean;
  /** Local creation time as "YYYY-MM-DD HH:mm" */
  readonly createdDate: string;
}

/**
 * Plain-data projection of a task, as written to the JSON file.
 */
export interface TaskRecord {
  id: number | null;
  title: string;
  description: string;
  deadline: string | null;
  completed: boolean;
  created_date: string;
}

/**
 * Derived task status. Never stored.
 */
export type TaskStatus = "active" | "completed" | "overdue";

export const STATUS_LABELS: Record<TaskStatus, string> = {
  active: "Active",
  completed: "Completed",
  overdue: "Overdue",
};

/**
 * Named read-only filters over the collection.
 */
export type TaskView = "all" | "active" | "completed" | "overdue";

export const TASK_VIEWS: readonly TaskView[] = ["all", "active", "completed", "overdue"];

/**
 * How tasks are matched when removing.
 * "title" removes every task sharing the title; "id" matches by id.
 */
export type TaskIdentity = "title" | "id";

/**
 * Input for adding or editing a task. Deadline is user text (DD.MM.YYYY or YYYY-MM-DD).
 */
export interface TaskInput {
  title: string;
  description?: string;
  deadline?: string | null;
}

/**
 * Selector used by callers to look a task up.
 */
export type TaskSelector = { id: number } | { title: string };

/**
 * Outcome of reading the store.
 */
export type LoadStatus = "loaded" | "created" | "recovered" | "unreadable";

export interface LoadReport<R> {
  status: LoadStatus;
  records: R[];
  /** Where the corrupt file was moved, for status "recovered" */
  backupPath?: string;
  message?: string;
}

/**
 * File metadata for the store.
 */
export interface StoreStats {
  size: number;
  modifiedAt: Date;
  createdAt: Date;
}

/**
 * Task counts per view.
 */
export type TaskSummary = Record<TaskView, number>;
