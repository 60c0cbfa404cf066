export type LogLevel =
  | "silent"
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace";

export interface LoggingDestination {
  type: "stdout" | "stderr" | "file";
  path?: string;
  pretty?: boolean;
  colorize?: boolean;
}

export interface LoggingConfig {
  level: LogLevel;
  destination?: LoggingDestination;
  enableTimestamps?: boolean;
}

export interface ExecutorConfig {
  /**
   * Maximum number of tasks admitted at once. `null` starts every task
   * immediately.
   */
  concurrency?: number | null;
}

export interface StreamEventsConfig {
  /** Mirror every derived event onto the CQRS event bus. */
  publishToEventBus: boolean;
  /** Ceiling for consumers served concurrently by `fanOut`. */
  fanOutConcurrency?: number | null;
}

export interface RunstreamConfig {
  logging: LoggingConfig;
  executor: ExecutorConfig;
  streamEvents: StreamEventsConfig;
}

export interface RuntimeOverrides {
  logLevel?: LogLevel;
  logFile?: string;
  concurrency?: number | null;
  fanOutConcurrency?: number | null;
  publishToEventBus?: boolean;
}
