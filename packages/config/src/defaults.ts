import { registerAs } from "@nestjs/config";
import type { RunstreamConfig } from "./types";

export const DEFAULT_CONFIG: RunstreamConfig = {
  logging: {
    level: "info",
    destination: {
      type: "stdout",
      pretty: false,
      colorize: true,
    },
    enableTimestamps: true,
  },
  executor: {
    concurrency: null,
  },
  streamEvents: {
    publishToEventBus: false,
    fanOutConcurrency: null,
  },
};

/** `@nestjs/config` namespace under which the defaults are registered. */
export const CONFIG_NAMESPACE = "runstream";

export const runstreamConfig = registerAs(
  CONFIG_NAMESPACE,
  (): RunstreamConfig => structuredClone(DEFAULT_CONFIG)
);
