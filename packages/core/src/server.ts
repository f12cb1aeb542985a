/**
 * MCP server bootstrap.
 * One lifecycle for every package: build services, register tools, connect stdio.
 */

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createLogger } from "./logger.js";

/**
 * Configuration for an MCP server.
 */
export interface ServerConfig {
  name: string;
  version: string;
}

/**
 * Options for bootstrapping an MCP server.
 */
export interface ServerBootstrapOptions<S> {
  config: ServerConfig;

  /** Builds the application context owned by this server */
  createServices: () => S | Promise<S>;

  registerTools: (server: McpServer, services: S) => void;

  /** Runs before the transport connects */
  onStartup?: (services: S) => Promise<void> | void;
}

/**
 * Bootstrap an MCP server: create services, register tools, install
 * SIGTERM/SIGINT handlers, run the startup hook and connect over stdio.
 */
async function bootstrapServer<S>(options: ServerBootstrapOptions<S>): Promise<void> {
  const { config, createServices, registerTools, onStartup } = options;
  const log = createLogger(config.name);

  const services = await createServices();

  const server = new McpServer({
    name: config.name,
    version: config.version,
  });

  registerTools(server, services);

  const transport = new StdioServerTransport();

  const shutdown = async (): Promise<void> => {
    log.info("Shutting down");
    await server.close();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error: unknown) => {
      log.error("Shutdown failed", error);
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);

  await onStartup?.(services);

  await server.connect(transport);
  log.info(`Listening on stdio (v${config.version})`);
}

/**
 * Run bootstrapServer and exit with code 1 on a fatal error.
 * This is the entry point servers call.
 */
export function runServer<S>(options: ServerBootstrapOptions<S>): void {
  bootstrapServer(options).catch((error: unknown) => {
    createLogger(options.config.name).error("Fatal error", error);
    process.exit(1);
  });
}

export { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
