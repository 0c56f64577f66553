import { Logger as TsLogger } from "tslog";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "silent";

type LogObj = Record<string, unknown>;

export type UsageLogger = TsLogger<LogObj>;

export type LogSink = (line: string) => void;

const LOG_LEVEL_ENV = "CODING_PLAN_USAGE_LOG_LEVEL";
const DEFAULT_LEVEL: LogLevel = "warn";

// tslog numbering: 0 silly, 1 trace, 2 debug, 3 info, 4 warn, 5 error, 6 fatal.
const MIN_LEVELS: Record<LogLevel, number> = {
  trace: 1,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
  silent: 7,
};

export function normalizeLogLevel(value: unknown, fallback: LogLevel = DEFAULT_LEVEL): LogLevel {
  if (typeof value !== "string") {
    return fallback;
  }
  const candidate = value.trim().toLowerCase();
  return isLogLevel(candidate) ? candidate : fallback;
}

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(MIN_LEVELS, value);
}

function defaultSink(line: string): void {
  process.stderr.write(`${line}\n`);
}

let sink: LogSink = defaultSink;

function formatRecord(record: LogObj): string | undefined {
  const meta = record._meta;
  if (meta === null || typeof meta !== "object") {
    return undefined;
  }

  const level = "logLevelName" in meta && typeof meta.logLevelName === "string" ? meta.logLevelName : "LOG";
  const name = "name" in meta && typeof meta.name === "string" ? meta.name : "usage";
  const date = "date" in meta && meta.date instanceof Date ? meta.date : new Date();

  const parts = Object.keys(record)
    .filter((key) => /^\d+$/.test(key))
    .sort((a, b) => Number(a) - Number(b))
    .map((key) => {
      const value = record[key];
      if (typeof value === "string") {
        return value;
      }
      return JSON.stringify(value);
    });

  return `${date.toISOString()} ${level.padEnd(5)} [${name}] ${parts.join(" ")}`;
}

const rootLogger: UsageLogger = new TsLogger<LogObj>({
  name: "usage",
  type: "hidden",
  minLevel: MIN_LEVELS[normalizeLogLevel(process.env[LOG_LEVEL_ENV])],
});

// Reports go to stdout, so log lines are routed to stderr.
rootLogger.attachTransport((record: LogObj) => {
  const line = formatRecord(record);
  if (line !== undefined) {
    sink(line);
  }
});

const subLoggers = new Set<UsageLogger>();

export function getLogger(name: string): UsageLogger {
  const logger = rootLogger.getSubLogger({ name });
  subLoggers.add(logger);
  return logger;
}

// Sub-loggers copy their settings when created, so each one is updated.
export function setLogLevel(level: LogLevel): void {
  rootLogger.settings.minLevel = MIN_LEVELS[level];
  for (const logger of subLoggers) {
    logger.settings.minLevel = MIN_LEVELS[level];
  }
}

/** Replaces the stderr writer; returns a function that restores the previous one. */
export function setLogSink(next: LogSink): () => void {
  const previous = sink;
  sink = next;
  return () => {
    sink = previous;
  };
}
