/**
 * Task collection - owns the in-memory task list.
 *
 * Converts between tasks and stored records, assigns ids, validates input and
 * persists after every change. Views are derived on each call.
 */

import { Err, andThen, map, silentLogger, type Logger, type Result } from "@tasklist/core";
import type {
  LoadReport,
  Task,
  TaskIdentity,
  TaskInput,
  TaskRecord,
  TaskSelector,
  TaskStatus,
  TaskSummary,
  TaskView,
} from "./model.js";
import { TASK_VIEWS } from "./model.js";
import type { StoredRecord } from "./schema.js";
import type { TaskStore } from "./TaskStore.js";
import { formatCreatedDate, formatIsoDate, parseDeadlineInput, parseIsoDate } from "./dates.js";
import { deriveStatus, matchesView } from "./status.js";

export interface TaskCollectionOptions {
  identity?: TaskIdentity;
  now?: () => Date;
  logger?: Logger;
}

interface ValidInput {
  title: string;
  description: string;
  deadline: string | null;
}

export class TaskCollection {
  private tasks: Task[] = [];
  private readonly identity: TaskIdentity;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    private readonly store: TaskStore,
    options: TaskCollectionOptions = {}
  ) {
    this.identity = options.identity ?? "title";
    this.now = options.now ?? (() => new Date());
    this.log = options.logger ?? silentLogger;
  }

  /**
   * Replace the collection with the store's contents.
   */
  load(): LoadReport<StoredRecord> {
    const report = this.store.load();
    this.tasks = report.records.map((record) => this.fromRecord(record));
    this.log.info(`Loaded ${this.tasks.length} task(s) (${report.status})`);
    return report;
  }

  /**
   * Write every task to the store.
   */
  save(): Result<void, string> {
    return this.store.save(this.tasks.map(toRecord));
  }

  /**
   * All tasks in insertion order.
   */
  list(): readonly Task[] {
    return this.tasks;
  }

  /**
   * First task matching the selector, in insertion order.
   */
  find(selector: TaskSelector): Task | undefined {
    if ("id" in selector) {
      return this.tasks.find((t) => t.id === selector.id);
    }
    return this.tasks.find((t) => t.title === selector.title);
  }

  add(input: TaskInput): Result<Task, string> {
    return andThen(validate(input), (valid) => {
      const task: Task = {
        id: this.nextId(),
        title: valid.title,
        description: valid.description,
        deadline: valid.deadline,
        completed: false,
        createdDate: formatCreatedDate(this.now()),
      };
      this.tasks.push(task);
      return this.persist(task);
    });
  }

  /**
   * Edit a task in place. Id and creation time are left alone.
   */
  update(task: Task, input: TaskInput): Result<Task, string> {
    return andThen(validate(input), (valid) => {
      task.title = valid.title;
      task.description = valid.description;
      task.deadline = valid.deadline;
      return this.persist(task);
    });
  }

  /**
   * Remove every task matching `task` under the identity mode.
   * In "title" mode all tasks sharing the title go.
   */
  remove(task: Task): Result<number, string> {
    const before = this.tasks.length;
    this.tasks = this.tasks.filter((t) => !this.matches(t, task));
    const removed = before - this.tasks.length;
    if (removed === 0) {
      return Err(`Task not found: ${task.title}`);
    }
    return this.persist(removed);
  }

  toggleCompletion(task: Task): Result<Task, string> {
    task.completed = !task.completed;
    return this.persist(task);
  }

  /**
   * Tasks in a view, computed against today's date.
   */
  filtered(view: TaskView): Task[] {
    const today = this.today();
    return this.tasks.filter((t) => matchesView(t, view, today));
  }

  statusOf(task: Task): TaskStatus {
    return deriveStatus(task, this.today());
  }

  /**
   * Number of tasks in each view.
   */
  summary(): TaskSummary {
    const today = this.today();
    const counts: TaskSummary = { all: 0, active: 0, completed: 0, overdue: 0 };
    for (const view of TASK_VIEWS) {
      counts[view] = this.tasks.filter((t) => matchesView(t, view, today)).length;
    }
    return counts;
  }

  /** Today's local date as YYYY-MM-DD */
  today(): string {
    return formatIsoDate(this.now());
  }

  /**
   * Save and pass `value` through. The in-memory change stays if the save fails.
   */
  private persist<T>(value: T): Result<T, string> {
    return map(this.save(), () => value);
  }

  // Strictly above every existing id; equals length + 1 when nothing was deleted.
  private nextId(): number {
    const maxId = this.tasks.reduce((max, t) => (t.id !== null && t.id > max ? t.id : max), 0);
    return Math.max(maxId, this.tasks.length) + 1;
  }

  private matches(candidate: Task, target: Task): boolean {
    if (this.identity === "title") {
      return candidate.title === target.title;
    }
    if (candidate.id === null || target.id === null) {
      return candidate === target;
    }
    return candidate.id === target.id;
  }

  private fromRecord(record: StoredRecord): Task {
    const deadline = record.deadline === null ? null : parseIsoDate(record.deadline);
    if (record.deadline !== null && record.deadline.trim() !== "" && deadline === null) {
      this.log.warn(`Ignoring malformed deadline "${record.deadline}" on "${record.title}"`);
    }
    return {
      id: record.id,
      title: record.title,
      description: record.description,
      deadline,
      completed: record.completed,
      createdDate: record.created_date ?? formatCreatedDate(this.now()),
    };
  }
}

function toRecord(task: Task): TaskRecord {
  return {
    id: task.id,
    title: task.title,
    description: task.description,
    deadline: task.deadline,
    completed: task.completed,
    created_date: task.createdDate,
  };
}

function validate(input: TaskInput): Result<ValidInput, string> {
  const title = input.title.trim();
  if (title === "") {
    return Err("Task title is required");
  }
  return map(parseDeadlineInput(input.deadline), (deadline) => ({
    title,
    description: (input.description ?? "").trim(),
    deadline,
  }));
}
