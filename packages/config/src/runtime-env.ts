import type { LogLevel, RuntimeOverrides } from "./types";

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);
const UNBOUNDED_VALUES = new Set(["none", "unbounded", "unlimited"]);
const LOG_LEVEL_VALUES = new Set<string>([
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
]);

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }

  if (FALSE_VALUES.has(normalized)) {
    return false;
  }

  return undefined;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_VALUES.has(value);
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

/**
 * `none`/`unbounded` map to `null` (no ceiling); anything that is not a
 * positive integer is ignored.
 */
function parseConcurrency(value: string | undefined): number | null | undefined {
  if (value === undefined) {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();
  if (UNBOUNDED_VALUES.has(normalized)) {
    return null;
  }

  const parsed = Number.parseInt(normalized, 10);
  return Number.isFinite(parsed) && parsed > 0 && String(parsed) === normalized
    ? parsed
    : undefined;
}

function parseString(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

export function resolveRuntimeOverridesFromEnv(
  env: NodeJS.ProcessEnv
): RuntimeOverrides {
  const options: RuntimeOverrides = {};

  const logLevel = parseLogLevel(env.RUNSTREAM_LOG_LEVEL);
  if (logLevel !== undefined) {
    options.logLevel = logLevel;
  }

  const logFile = parseString(env.RUNSTREAM_LOG_FILE);
  if (logFile !== undefined) {
    options.logFile = logFile;
  }

  const concurrency = parseConcurrency(env.RUNSTREAM_CONCURRENCY);
  if (concurrency !== undefined) {
    options.concurrency = concurrency;
  }

  const fanOutConcurrency = parseConcurrency(env.RUNSTREAM_FANOUT_CONCURRENCY);
  if (fanOutConcurrency !== undefined) {
    options.fanOutConcurrency = fanOutConcurrency;
  }

  const publishToEventBus = parseBoolean(env.RUNSTREAM_PUBLISH_EVENTS);
  if (publishToEventBus !== undefined) {
    options.publishToEventBus = publishToEventBus;
  }

  return options;
}

export function resolveRuntimeOverrides(
  moduleOptions?: RuntimeOverrides,
  env: NodeJS.ProcessEnv = process.env,
): RuntimeOverrides {
  const envOptions = resolveRuntimeOverridesFromEnv(env);
  return {
    ...envOptions,
    ...(moduleOptions ?? {}),
  } satisfies RuntimeOverrides;
}
