/**
 * task_toggle tool - Flip a task between active and completed.
 */

import { andThen, resultToResponse } from "@tasklist/core";
import type { ToolRegistrar, SelectorInput } from "./types.js";
import { selectorShape } from "./types.js";
import { selectTask } from "./selectTask.js";
import { toTaskRow } from "../core/status.js";

export const registerTaskToggle: ToolRegistrar = (server, { tasks }) => {
  server.registerTool(
    "task_toggle",
    {
      title: "Toggle task completion",
      description: "Mark an active task completed, or a completed task active again.",
      inputSchema: selectorShape,
    },
    async (input: SelectorInput) => {
      const today = tasks.today();
      const result = andThen(selectTask(tasks, input), (task) => tasks.toggleCompletion(task));
      return resultToResponse(result, (task) => ({
        text: `Task "${task.title}" marked ${task.completed ? "completed" : "active"}`,
        data: { task: toTaskRow(task, today) },
      }));
    }
  );
};
