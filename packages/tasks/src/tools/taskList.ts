/**
 * task_list tool - List tasks in a view.
 */

import { z } from "zod";
import { successResponse } from "@tasklist/core";
import type { ToolRegistrar } from "./types.js";
import type { TaskView } from "../core/model.js";
import { TASK_VIEWS } from "../core/model.js";
import { toTaskRow, type TaskRow } from "../core/status.js";

interface ListInput {
  view: TaskView;
}

export function formatRow(row: TaskRow): string {
  const id = row.id === null ? "-" : `#${row.id}`;
  return `${id} ${row.title} | ${row.deadline} | ${row.status} | ${row.created}`;
}

export const registerTaskList: ToolRegistrar = (server, { tasks }) => {
  server.registerTool(
    "task_list",
    {
      title: "List tasks",
      description: "List tasks in a view: all, active, completed or overdue. Overdue tasks are not listed as active.",
      inputSchema: {
        view: z.enum(["all", "active", "completed", "overdue"]).optional().default("all").describe("View"),
      },
    },
    async (input: ListInput) => {
      const today = tasks.today();
      const rows = tasks.filtered(input.view).map((task) => toTaskRow(task, today));
      const summary = tasks.summary();

      const header = `${rows.length} task(s) in view "${input.view}"`;
      const counts = TASK_VIEWS.map((view) => `${view}: ${summary[view]}`).join(", ");
      const text = [header, ...rows.map(formatRow), `(${counts})`].join("\n");

      return successResponse(text, { view: input.view, tasks: rows, summary });
    }
  );
};
