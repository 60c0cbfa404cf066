import type { RuntimeOverrides } from "./types";

export function hasRuntimeOverrides(options: RuntimeOverrides): boolean {
  if (typeof options.publishToEventBus === "boolean") {
    return true;
  }

  if (options.concurrency !== undefined || options.fanOutConcurrency !== undefined) {
    return true;
  }

  const stringOverrides = [options.logLevel, options.logFile];

  return stringOverrides.some(
    (value) => typeof value !== "undefined" && value.length > 0
  );
}
