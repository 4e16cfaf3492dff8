export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type Logger = {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

export function createLogger(level: LogLevel = "info"): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const enabled = (candidate: LogLevel) => LOG_LEVELS.indexOf(candidate) >= threshold;

  return {
    debug: (message) => {
      if (enabled("debug")) {
        console.log(message);
      }
    },
    info: (message) => {
      if (enabled("info")) {
        console.log(message);
      }
    },
    warn: (message) => {
      if (enabled("warn")) {
        console.error(`Warning: ${message}`);
      }
    },
    error: (message) => {
      console.error(message);
    },
  };
}
