/**
 * Leveled stderr logger. stdout is reserved for the MCP protocol.
 *
 * @module logger
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  child(scope: string): Logger;
}

export type LogSink = (line: string) => void;

export function createLogger(
  scope: string,
  level: LogLevel = "info",
  sink: LogSink = (line) => console.error(line)
): Logger {
  const write = (at: LogLevel, message: string) => {
    if (SEVERITY[at] < SEVERITY[level]) return;
    sink(`[${scope}] ${at.toUpperCase()} ${message}`);
  };

  return {
    debug: (message) => write("debug", message),
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
    child: (name) => createLogger(`${scope}:${name}`, level, sink),
  };
}
