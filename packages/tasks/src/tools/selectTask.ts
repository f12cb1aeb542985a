import { Ok, Err, type Result } from "@tasklist/core";
import type { Task } from "../core/model.js";
import type { TaskCollection } from "../core/TaskCollection.js";
import type { SelectorInput } from "./types.js";

/**
 * Resolve a tool's id/title input to a task. The id wins when both are given.
 */
export function selectTask(tasks: TaskCollection, input: SelectorInput): Result<Task, string> {
  if (input.id !== undefined) {
    const task = tasks.find({ id: input.id });
    return task ? Ok(task) : Err(`Task not found: #${input.id}`);
  }
  const title = input.title?.trim() ?? "";
  if (title !== "") {
    const task = tasks.find({ title });
    return task ? Ok(task) : Err(`Task not found: "${title}"`);
  }
  return Err("Provide a task id or title");
}
