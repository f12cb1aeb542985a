export type { Result } from "./result.js";
export { Ok, Err, map, mapErr, andThen, unwrapOr, tryCatch } from "./result.js";

export type { TextContent, ToolResponse, ErrorPayload } from "./mcp.js";
export { errorResponse, successResponse, resultToResponse } from "./mcp.js";

export type { Logger, LogSink } from "./logger.js";
export { createLogger, silentLogger } from "./logger.js";

export type { ServerConfig, ServerBootstrapOptions } from "./server.js";
export { runServer, McpServer } from "./server.js";
