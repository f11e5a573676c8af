import type { LogLevel } from "../env";

type EventLevel = Exclude<LogLevel, "silent">;

export type LogEvent = {
  ts?: string;
  level: EventLevel;
  event: string;
  subscriptionId?: string;
  status?: number;
  durationMs?: number;
  detail?: string;
  [field: string]: unknown;
};

export type Logger = {
  log: (event: LogEvent) => void;
  debug: (event: string, fields?: Record<string, unknown>) => void;
  info: (event: string, fields?: Record<string, unknown>) => void;
  warn: (event: string, fields?: Record<string, unknown>) => void;
  error: (event: string, fields?: Record<string, unknown>) => void;
};

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/**
 * JSON-line logger. Everything goes to stderr so stdout carries only the
 * cost table.
 */
export function createLogger(minLevel: LogLevel, sink: (line: string) => void = console.error): Logger {
  const log = (event: LogEvent): void => {
    if (RANK[event.level] < RANK[minLevel]) return;
    sink(JSON.stringify({ ...event, ts: event.ts || new Date().toISOString() }));
  };
  const at =
    (level: EventLevel) =>
    (event: string, fields?: Record<string, unknown>): void =>
      log({ ...fields, level, event });

  return {
    log,
    debug: at("debug"),
    info: at("info"),
    warn: at("warn"),
    error: at("error"),
  };
}

export const silentLogger: Logger = createLogger("silent");
