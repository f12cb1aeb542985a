/**
 * task_add tool - Create a task.
 */

import { z } from "zod";
import { resultToResponse } from "@tasklist/core";
import type { ToolRegistrar } from "./types.js";
import { toTaskRow } from "../core/status.js";

interface AddInput {
  title: string;
  description?: string;
  deadline?: string;
}

export const registerTaskAdd: ToolRegistrar = (server, { tasks }) => {
  server.registerTool(
    "task_add",
    {
      title: "Add task",
      description: "Create a task. Deadline is DD.MM.YYYY or YYYY-MM-DD.",
      inputSchema: {
        title: z.string().describe("Task title"),
        description: z.string().optional().describe("Task description"),
        deadline: z.string().optional().describe("Deadline (DD.MM.YYYY)"),
      },
    },
    async (input: AddInput) => {
      const today = tasks.today();
      return resultToResponse(tasks.add(input), (task) => ({
        text: `Added task #${task.id}: ${task.title}`,
        data: { task: toTaskRow(task, today) },
      }));
    }
  );
};
