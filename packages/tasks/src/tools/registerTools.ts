/**
 * Register all task MCP tools.
 */

import type { McpServer } from "@tasklist/core";
import type { TaskListContext } from "../context.js";

import { registerTaskList } from "./taskList.js";
import { registerTaskGet } from "./taskGet.js";
import { registerTaskAdd } from "./taskAdd.js";
import { registerTaskUpdate } from "./taskUpdate.js";
import { registerTaskToggle } from "./taskToggle.js";
import { registerTaskDelete } from "./taskDelete.js";
import { registerTaskBackup, registerTaskStats } from "./taskStorage.js";

export function registerTaskTools(server: McpServer, context: TaskListContext): void {
  registerTaskList(server, context);
  registerTaskGet(server, context);
  registerTaskAdd(server, context);
  registerTaskUpdate(server, context);
  registerTaskToggle(server, context);
  registerTaskDelete(server, context);
  registerTaskBackup(server, context);
  registerTaskStats(server, context);
}
