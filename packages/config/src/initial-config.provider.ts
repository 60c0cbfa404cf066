import type { FactoryProvider } from "@nestjs/common";
import type { ConfigType } from "@nestjs/config";
import { ConfigService } from "./config.service";
import { MODULE_OPTIONS_TOKEN, INITIAL_CONFIG_TOKEN } from "./config.const";
import { runstreamConfig } from "./defaults";
import type { RunstreamConfig, RuntimeOverrides } from "./types";
import { resolveRuntimeOverrides } from "./runtime-env";

export const initialConfigProvider: FactoryProvider<RunstreamConfig> = {
  provide: INITIAL_CONFIG_TOKEN,
  inject: [
    { token: MODULE_OPTIONS_TOKEN, optional: true },
    { token: runstreamConfig.KEY, optional: true },
  ],
  useFactory: (
    moduleOptions?: RuntimeOverrides,
    defaults?: ConfigType<typeof runstreamConfig>,
  ): RunstreamConfig => {
    const service = new ConfigService(
      resolveRuntimeOverrides(moduleOptions),
      defaults,
    );

    return service.compose();
  },
};
