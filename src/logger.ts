import { redactSecrets } from "./redact.js";

export type LogLevel = "info" | "warn" | "error";

export type LogSink = (level: LogLevel, message: string, data?: Record<string, unknown>) => void;

/**
 * One log line, newline-terminated and scrubbed of secrets. JSON lines carry
 * `data` fields at the top level beside `level`, `message` and `timestamp`.
 */
export function formatLogLine(
  level: LogLevel,
  message: string,
  json: boolean,
  data?: Record<string, unknown>,
  at: Date = new Date()
): string {
  const timestamp = at.toISOString();
  const line = json
    ? JSON.stringify({ level, message, ...data, timestamp })
    : `[${timestamp}] [${level.toUpperCase()}] ${message}${data ? ` ${JSON.stringify(data)}` : ""}`;
  return `${redactSecrets(line)}\n`;
}

// stderr, so stdout stays free for tokens and JSON results.
export function log(level: LogLevel, message: string, json: boolean, data?: Record<string, unknown>): void {
  process.stderr.write(formatLogLine(level, message, json, data));
}

export function createLogSink(json: boolean): LogSink {
  return (level, message, data) => log(level, message, json, data);
}
