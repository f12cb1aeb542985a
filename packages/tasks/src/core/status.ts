/**
 * Derived status and display helpers. Status is a pure function of the
 * completion flag, the deadline and today's date.
 */

import type { Task, TaskStatus, TaskView } from "./model.js";
import { STATUS_LABELS } from "./model.js";
import { formatDeadline } from "./dates.js";

/**
 * Status of a task on `today` (YYYY-MM-DD). Completed wins over overdue.
 */
export function deriveStatus(task: Task, today: string): TaskStatus {
  if (task.completed) return "completed";
  if (task.deadline !== null && task.deadline < today) return "overdue";
  return "active";
}

export function matchesView(task: Task, view: TaskView, today: string): boolean {
  if (view === "all") return true;
  return deriveStatus(task, today) === view;
}

/**
 * One row of a task listing.
 */
export interface TaskRow {
  id: number | null;
  title: string;
  deadline: string;
  status: string;
  created: string;
}

export function toTaskRow(task: Task, today: string): TaskRow {
  return {
    id: task.id,
    title: task.title,
    deadline: formatDeadline(task.deadline),
    status: STATUS_LABELS[deriveStatus(task, today)],
    created: task.createdDate.split(" ")[0] ?? "",
  };
}

/**
 * Multi-line details text for a single task.
 */
export function describeTask(task: Task, today: string): string {
  return [
    `Title: ${task.title}`,
    `Description: ${task.description || "Not specified"}`,
    `Deadline: ${formatDeadline(task.deadline)}`,
    `Status: ${STATUS_LABELS[deriveStatus(task, today)]}`,
    `Created: ${task.createdDate}`,
  ].join("\n");
}
