/**
 * task_get tool - Show one task in detail.
 */

import { resultToResponse } from "@tasklist/core";
import type { ToolRegistrar, SelectorInput } from "./types.js";
import { selectorShape } from "./types.js";
import { selectTask } from "./selectTask.js";
import { describeTask, toTaskRow } from "../core/status.js";

export const registerTaskGet: ToolRegistrar = (server, { tasks }) => {
  server.registerTool(
    "task_get",
    {
      title: "Get task",
      description: "Show title, description, deadline, status and creation time of a task.",
      inputSchema: selectorShape,
    },
    async (input: SelectorInput) => {
      const today = tasks.today();
      return resultToResponse(selectTask(tasks, input), (task) => ({
        text: describeTask(task, today),
        data: { task: toTaskRow(task, today), description: task.description },
      }));
    }
  );
};
