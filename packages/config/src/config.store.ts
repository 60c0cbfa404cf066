import { Inject, Injectable, Optional } from "@nestjs/common";
import { DEFAULT_CONFIG } from "./defaults";
import { INITIAL_CONFIG_TOKEN } from "./config.const";
import type { RunstreamConfig } from "./types";

/**
 * Holds the configuration composed when the module starts. Readers get their
 * own copy, so a caller editing a snapshot never affects another.
 */
@Injectable()
export class ConfigStore {
  private readonly snapshot: RunstreamConfig;

  constructor(
    @Optional()
    @Inject(INITIAL_CONFIG_TOKEN)
    initialConfig?: RunstreamConfig,
  ) {
    this.snapshot = structuredClone(initialConfig ?? DEFAULT_CONFIG);
  }

  getSnapshot(): RunstreamConfig {
    return structuredClone(this.snapshot);
  }
}
