/**
 * Shared types for task tool registration.
 */

import { z } from "zod";
import type { McpServer } from "@tasklist/core";
import type { TaskListContext } from "../context.js";

/**
 * Function type for registering a tool with an MCP server.
 */
export interface ToolRegistrar {
  (server: McpServer, context: TaskListContext): void;
}

/**
 * Input fields that pick one task.
 */
export interface SelectorInput {
  id?: number;
  title?: string;
}

export const selectorShape = {
  id: z.number().int().optional().describe("Task ID"),
  title: z.string().optional().describe("Task title (used when no ID is given)"),
};
