export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = (level: LogLevel, msg: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Console-backed logger with a "[insights]" prefix.
 * Messages below `minLevel` are dropped.
 */
export function createConsoleLogger(minLevel: LogLevel = "info"): Logger {
  const threshold = LEVEL_ORDER[minLevel];
  return (level, msg) => {
    if (LEVEL_ORDER[level] < threshold) return;
    const line = `[insights] ${msg}`;
    if (level === "error") console.error(line);
    else if (level === "warn") console.warn(line);
    else console.log(line);
  };
}

export const silentLogger: Logger = () => undefined;

/** Read a level name such as "debug" from the environment. */
export function parseLogLevel(raw: string | undefined): LogLevel {
  const value = (raw ?? "").toLowerCase();
  if (
    value === "debug" ||
    value === "info" ||
    value === "warn" ||
    value === "error"
  ) {
    return value;
  }
  return "info";
}
