/**
 * Tagged logger.
 * Writes to stderr because stdout carries the MCP stdio transport.
 */

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, cause?: unknown): void;
}

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  console.error(line);
};

/**
 * Create a logger whose lines start with `[tag]`.
 */
export function createLogger(tag: string, sink: LogSink = stderrSink): Logger {
  const prefix = `[${tag}]`;
  return {
    info: (message) => sink(`${prefix} ${message}`),
    warn: (message) => sink(`${prefix} Warning: ${message}`),
    error: (message, cause) => {
      if (cause === undefined) {
        sink(`${prefix} Error: ${message}`);
        return;
      }
      const detail = cause instanceof Error ? cause.message : String(cause);
      sink(`${prefix} Error: ${message}: ${detail}`);
    },
  };
}

/**
 * Logger that drops everything. Handy in tests.
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
