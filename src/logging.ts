// =============================================================================
// Logging — Structured parser lifecycle events
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  event: string;
  data?: Record<string, unknown>;
}

export type Logger = (entry: LogEntry) => void;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export type LogEmitter = (
  level: LogLevel,
  event: string,
  data?: Record<string, unknown>,
) => void;

/** Logger that writes `[iso-time] [level] event data` lines to the console. */
export function createConsoleLogger(): Logger {
  return (entry: LogEntry) => {
    const prefix = `[${new Date(entry.timestamp).toISOString()}] [${entry.level}]`;
    // eslint-disable-next-line no-console
    console.log(`${prefix} ${entry.event}`, entry.data ?? "");
  };
}

/**
 * Bind a logger and a threshold into an emitter. Without a logger the
 * emitter does nothing.
 */
export function createLogEmitter(
  logger: Logger | undefined,
  minLevel: LogLevel,
): LogEmitter {
  if (!logger) return () => {};
  const threshold = LEVEL_RANK[minLevel];

  return (level, event, data) => {
    if (LEVEL_RANK[level] < threshold) return;
    logger({ timestamp: Date.now(), level, event, data });
  };
}
