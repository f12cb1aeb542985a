/**
 * MCP tool response helpers.
 * Every tool answers with a text block for humans and structured content for agents.
 */

import type { Result } from "./result.js";

/**
 * MCP text content block. A type literal, so it fits the SDK's open content shape.
 */
export type TextContent = {
  type: "text";
  text: string;
};

/**
 * MCP tool response. The index signature keeps it assignable to the SDK's CallToolResult.
 */
export type ToolResponse<T extends Record<string, unknown> = Record<string, unknown>> = {
  [key: string]: unknown;
  content: TextContent[];
  structuredContent?: T;
  isError?: boolean;
};

export type ErrorPayload = { success: false; error: string };

/**
 * Create an error response. Text is prefixed with "Error:".
 */
export function errorResponse(message: string): ToolResponse<ErrorPayload> {
  return {
    content: [{ type: "text", text: `Error: ${message}` }],
    structuredContent: { success: false, error: message },
    isError: true,
  };
}

/**
 * Create a success response with text and optional structured data.
 */
export function successResponse<T extends Record<string, unknown>>(
  text: string,
  data?: T
): ToolResponse<T & { success: true }> {
  return {
    content: [{ type: "text", text }],
    structuredContent: data ? { ...data, success: true as const } : ({ success: true } as T & { success: true }),
  };
}

/**
 * Convert a Result to a tool response.
 * Ok values go through the formatter; errors become an error response.
 */
export function resultToResponse<T, E extends string | Error, S extends Record<string, unknown>>(
  result: Result<T, E>,
  formatter: (value: T) => { text: string; data: S }
): ToolResponse<(S & { success: true }) | ErrorPayload> {
  if (result.ok) {
    const { text, data } = formatter(result.value);
    return successResponse(text, data);
  }
  const error: string | Error = result.error;
  const message = error instanceof Error ? error.message : error;
  return errorResponse(message);
}
