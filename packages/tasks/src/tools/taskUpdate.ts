/**
 * task_update tool - Edit a task's title, description or deadline.
 * Omitted fields keep their current values; an empty deadline clears it.
 */

import { z } from "zod";
import { andThen, resultToResponse } from "@tasklist/core";
import type { ToolRegistrar, SelectorInput } from "./types.js";
import { selectorShape } from "./types.js";
import { selectTask } from "./selectTask.js";
import { toTaskRow } from "../core/status.js";

interface UpdateInput extends SelectorInput {
  new_title?: string;
  description?: string;
  deadline?: string;
}

export const registerTaskUpdate: ToolRegistrar = (server, { tasks }) => {
  server.registerTool(
    "task_update",
    {
      title: "Update task",
      description: "Edit a task. Omitted fields are unchanged; an empty deadline removes it.",
      inputSchema: {
        ...selectorShape,
        new_title: z.string().optional().describe("New title"),
        description: z.string().optional().describe("New description"),
        deadline: z.string().optional().describe("New deadline (DD.MM.YYYY), empty to clear"),
      },
    },
    async (input: UpdateInput) => {
      const today = tasks.today();
      const result = andThen(selectTask(tasks, input), (task) =>
        tasks.update(task, {
          title: input.new_title ?? task.title,
          description: input.description ?? task.description,
          deadline: input.deadline ?? task.deadline,
        })
      );
      return resultToResponse(result, (task) => ({
        text: `Updated task #${task.id}: ${task.title}`,
        data: { task: toTaskRow(task, today) },
      }));
    }
  );
};
