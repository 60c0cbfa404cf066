import {
  Global,
  Module,
} from "@nestjs/common";
import { ConfigModule as NestConfigModule } from "@nestjs/config";
import { runstreamConfig } from "./defaults";
import { ConfigService } from "./config.service";
import { ConfigStore } from "./config.store";
import { initialConfigProvider } from "./initial-config.provider";
import type { RuntimeOverrides } from "./types";
import { ConfigurableModuleClass, MODULE_OPTIONS_TOKEN } from "./config.const";
import { ConfigValidator } from "./validation/config-validator";

@Global()
@Module({
  imports: [NestConfigModule.forFeature(runstreamConfig)],
  providers: [
    ConfigValidator,
    ConfigService,
    initialConfigProvider,
    ConfigStore,
  ],
  exports: [
    ConfigService,
    ConfigStore,
    ConfigValidator,
    NestConfigModule,
  ],
})
export class ConfigModule extends ConfigurableModuleClass {
  static register(
    options: RuntimeOverrides,
  ): ReturnType<typeof ConfigurableModuleClass["register"]> {
    const dynamicModule = super.register(options);
    return {
      ...dynamicModule,
      providers: [
        ...(dynamicModule.providers ?? []),
        {
          provide: MODULE_OPTIONS_TOKEN,
          useValue: options,
        },
      ],
      exports: [...(dynamicModule.exports ?? []), MODULE_OPTIONS_TOKEN],
      global: true,
    };
  }
}
