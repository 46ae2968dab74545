import pino from "pino";

export type LoggingConfig = {
  level: pino.Level;
  destination: "stdout" | "stderr" | string;
};

const VALID_LEVELS: pino.Level[] = ["trace", "debug", "info", "warn", "error", "fatal"];

function isLevel(value: string): value is pino.Level {
  return VALID_LEVELS.some((level) => level === value);
}

function resolveLogLevel(env: NodeJS.ProcessEnv): pino.Level {
  const level = env.LOG_LEVEL?.trim().toLowerCase();

  if (level && isLevel(level)) {
    return level;
  }

  return env.NODE_ENV === "test" ? "warn" : "info";
}

function resolveDestination(env: NodeJS.ProcessEnv): "stdout" | "stderr" | string {
  const destination = env.LOG_DESTINATION?.trim();
  if (!destination) {
    return "stdout";
  }
  const lowered = destination.toLowerCase();
  if (lowered === "stdout" || lowered === "stderr") {
    return lowered;
  }

  // Anything else is a file path, appended to.
  return destination;
}

function createDestination(destination: string): pino.DestinationStream {
  if (destination === "stdout") {
    return pino.destination({ dest: 1, sync: true });
  }
  if (destination === "stderr") {
    return pino.destination({ dest: 2, sync: true });
  }
  return pino.destination({ dest: destination, append: true, sync: true });
}

export function getLoggingConfig(env: NodeJS.ProcessEnv = process.env): LoggingConfig {
  return {
    level: resolveLogLevel(env),
    destination: resolveDestination(env),
  };
}

export function buildLogger(config: LoggingConfig = getLoggingConfig()): pino.Logger {
  return pino(
    {
      level: config.level,
      formatters: {
        level: (label: string) => ({ level: label }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    createDestination(config.destination),
  );
}

export const logger = buildLogger();

export function createChildLogger(component: string): pino.Logger {
  return logger.child({ component });
}

export const parserLogger = createChildLogger("PARSER");
