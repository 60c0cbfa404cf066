import { describe, expect, it } from "vitest";

import { ConfigService } from "../src/config.service";
import { DEFAULT_CONFIG } from "../src/defaults";
import type { RunstreamConfig } from "../src/types";

describe("ConfigService", () => {
  it("returns the defaults when nothing is overridden", () => {
    const service = new ConfigService();

    expect(service.compose()).toEqual(DEFAULT_CONFIG);
  });

  it("starts from namespaced defaults when provided", () => {
    const defaults: RunstreamConfig = structuredClone(DEFAULT_CONFIG);
    defaults.executor.concurrency = 3;

    const service = new ConfigService(undefined, defaults);

    expect(service.compose().executor.concurrency).toBe(3);
  });

  it("applies module options and then call overrides", () => {
    const service = new ConfigService({ logLevel: "warn", concurrency: 2 });

    const config = service.compose({ concurrency: 6, publishToEventBus: true });

    expect(config.logging.level).toBe("warn");
    expect(config.executor.concurrency).toBe(6);
    expect(config.streamEvents.publishToEventBus).toBe(true);
  });

  it("ignores call overrides that are explicitly undefined", () => {
    const service = new ConfigService({ concurrency: 2 });

    const config = service.compose({ concurrency: undefined });

    expect(config.executor.concurrency).toBe(2);
  });

  it("routes logs to a file when a log file is requested", () => {
    const service = new ConfigService({ logFile: "logs/run.log" });

    expect(service.compose().logging.destination).toEqual({
      type: "file",
      path: "logs/run.log",
      pretty: false,
      colorize: true,
    });
  });

  it("does not mutate the injected defaults", () => {
    const defaults: RunstreamConfig = structuredClone(DEFAULT_CONFIG);
    const service = new ConfigService({ concurrency: 5 }, defaults);

    service.compose();

    expect(defaults.executor.concurrency).toBeNull();
  });

  it("validates the composed configuration", () => {
    const service = new ConfigService({ fanOutConcurrency: -1 });

    expect(() => service.compose()).toThrowError(
      "streamEvents.fanOutConcurrency must be greater than zero",
    );
  });
});
