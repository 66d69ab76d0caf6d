import { createSilentLogger, type Logger } from "@depintel/core";

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug"];

const logLevelRank: Readonly<Record<Exclude<LogLevel, "silent">, number>> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

const shouldLog = (configuredLevel: LogLevel, messageLevel: Exclude<LogLevel, "silent">): boolean => {
  if (configuredLevel === "silent") {
    return false;
  }

  return logLevelRank[messageLevel] <= logLevelRank[configuredLevel];
};

export const formatLogLine = (messageLevel: Exclude<LogLevel, "silent">, message: string): string =>
  `[depintel] ${messageLevel.toUpperCase()} ${message}\n`;

export const createStderrLogger = (
  level: LogLevel,
  write: (line: string) => void = (line) => {
    process.stderr.write(line);
  },
): Logger => {
  if (level === "silent") {
    return createSilentLogger();
  }

  const emit = (messageLevel: Exclude<LogLevel, "silent">) => (message: string) => {
    if (shouldLog(level, messageLevel)) {
      write(formatLogLine(messageLevel, message));
    }
  };

  return {
    error: emit("error"),
    warn: emit("warn"),
    info: emit("info"),
    debug: emit("debug"),
  };
};

export const parseLogLevel = (value: string | undefined): LogLevel => {
  switch (value) {
    case "silent":
    case "error":
    case "warn":
    case "info":
    case "debug":
      return value;
    default:
      return "info";
  }
};
