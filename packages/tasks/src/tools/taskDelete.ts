/**
 * task_delete tool - Remove a task.
 * With TASKLIST_MATCH_BY=title every task sharing the title is removed.
 */

import { andThen, map, resultToResponse } from "@tasklist/core";
import type { ToolRegistrar, SelectorInput } from "./types.js";
import { selectorShape } from "./types.js";
import { selectTask } from "./selectTask.js";

export const registerTaskDelete: ToolRegistrar = (server, { tasks }) => {
  server.registerTool(
    "task_delete",
    {
      title: "Delete task",
      description: "Remove a task permanently.",
      inputSchema: selectorShape,
    },
    async (input: SelectorInput) => {
      const result = andThen(selectTask(tasks, input), (task) =>
        map(tasks.remove(task), (removed) => ({ removed, title: task.title }))
      );
      return resultToResponse(result, ({ removed, title }) => ({
        text: `Deleted ${removed} task(s) titled "${title}"`,
        data: { removed },
      }));
    }
  );
};
