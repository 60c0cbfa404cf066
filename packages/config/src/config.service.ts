import { Inject, Injectable, Logger, Optional } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import { ConfigValidator } from "./validation/config-validator";
import { MODULE_OPTIONS_TOKEN } from "./config.const";
import { runstreamConfig } from "./defaults";
import { DEFAULT_CONFIG } from "./defaults";
import { hasRuntimeOverrides } from "./runtime-overrides";
import type { RunstreamConfig, RuntimeOverrides } from "./types";

/**
 * ConfigService layers namespaced defaults, module registration options and
 * per-call overrides into a validated {@link RunstreamConfig}.
 */
@Injectable()
export class ConfigService {
  private readonly logger = new Logger(ConfigService.name);
  private readonly moduleOptions: RuntimeOverrides;
  private readonly validator: ConfigValidator;

  constructor(
    @Optional()
    @Inject(MODULE_OPTIONS_TOKEN)
    moduleOptions?: RuntimeOverrides,
    @Optional()
    @Inject(runstreamConfig.KEY)
    private readonly defaultsProvider?: ConfigType<typeof runstreamConfig>,
    @Optional()
    @Inject(ConfigValidator)
    validator?: ConfigValidator,
  ) {
    this.moduleOptions = moduleOptions ?? {};
    this.validator = validator ?? new ConfigValidator();
  }

  compose(overrides: RuntimeOverrides = {}): RunstreamConfig {
    const mergedOverrides = {
      ...this.moduleOptions,
      ...this.removeUndefinedOverrides(overrides),
    };

    if (hasRuntimeOverrides(mergedOverrides)) {
      this.logger.debug(
        `Applying runtime overrides: ${Object.keys(mergedOverrides).join(", ")}`,
      );
    }

    const finalConfig = this.applyOverrides(
      this.resolveDefaultConfig(),
      mergedOverrides,
    );

    this.validator.validate(finalConfig);

    return finalConfig;
  }

  private applyOverrides(
    defaults: RunstreamConfig,
    overrides: RuntimeOverrides,
  ): RunstreamConfig {
    // Precedence: namespaced defaults → environment → module options → call.
    const logging = { ...defaults.logging };
    if (overrides.logLevel !== undefined) {
      logging.level = overrides.logLevel;
    }
    if (overrides.logFile !== undefined) {
      logging.destination = {
        ...(logging.destination ?? {}),
        type: "file",
        path: overrides.logFile,
      };
    }

    const executor = { ...defaults.executor };
    if (overrides.concurrency !== undefined) {
      executor.concurrency = overrides.concurrency;
    }

    const streamEvents = { ...defaults.streamEvents };
    if (overrides.fanOutConcurrency !== undefined) {
      streamEvents.fanOutConcurrency = overrides.fanOutConcurrency;
    }
    if (overrides.publishToEventBus !== undefined) {
      streamEvents.publishToEventBus = overrides.publishToEventBus;
    }

    return { logging, executor, streamEvents };
  }

  private removeUndefinedOverrides(
    options: RuntimeOverrides,
  ): RuntimeOverrides {
    if (!Object.values(options).some((value) => value === undefined)) {
      return options;
    }

    const result: RuntimeOverrides = { ...options };
    for (const [key, value] of Object.entries(options)) {
      if (value === undefined) {
        Reflect.deleteProperty(result, key);
      }
    }
    return result;
  }

  private resolveDefaultConfig(): RunstreamConfig {
    if (this.defaultsProvider) {
      return structuredClone(this.defaultsProvider);
    }

    return structuredClone(DEFAULT_CONFIG);
  }
}
