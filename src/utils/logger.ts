/**
 * Logger Module
 * Structured logging using pino, written to stderr so triples can go to stdout
 */

import pino, { type Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const VALID_LEVELS: readonly LogLevel[] = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
];

const STDERR_FD = 2;

/**
 * Pretty output only for interactive development runs
 */
function isDevelopment(): boolean {
  const env = process.env.NODE_ENV;
  return env !== "production" && env !== "test" && !process.env.VITEST;
}

function isLogLevel(value: string): value is LogLevel {
  return VALID_LEVELS.some((level) => level === value);
}

/**
 * Get log level from environment or default
 */
function getLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  if (process.env.VITEST) return "silent";
  return "info";
}

let rootLogger: PinoLogger | null = null;
const componentLoggers = new Set<PinoLogger>();

function getRootLogger(): PinoLogger {
  if (rootLogger) return rootLogger;

  const baseOptions: pino.LoggerOptions = {
    name: "typegraph-rdf",
    level: getLogLevel(),
  };

  if (isDevelopment()) {
    try {
      rootLogger = pino({
        ...baseOptions,
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:HH:MM:ss",
            ignore: "pid,hostname",
            destination: STDERR_FD,
          },
        },
      });
      return rootLogger;
    } catch {
      // pino-pretty unavailable, plain JSON below
    }
  }

  rootLogger = pino(baseOptions, pino.destination(STDERR_FD));
  return rootLogger;
}

/**
 * Create a logger for a specific component
 *
 * @example
 * ```typescript
 * const logger = createLogger("extractor");
 * logger.info({ module: "Sample" }, "Extracting module");
 * ```
 */
export function createLogger(component: string): PinoLogger {
  const logger = getRootLogger().child({ component });
  componentLoggers.add(logger);
  return logger;
}

/**
 * Change the level of the root logger and every component logger created so far.
 */
export function setLogLevel(level: LogLevel): void {
  const root = getRootLogger();
  root.level = level;
  for (const logger of componentLoggers) {
    logger.level = level;
  }
}

export type Logger = PinoLogger;
