import { Module, type FactoryProvider } from "@nestjs/common";
import { CqrsModule } from "@nestjs/cqrs";
import { ConfigModule, ConfigStore } from "@runstream/config";
import { IoModule, LoggerService, getLoggerToken } from "@runstream/io";
import type { Logger } from "pino";
import { StreamEventsService } from "./stream-events/stream-events.service";

export const STREAM_EVENTS_LOGGER_SCOPE = "stream-events";

const streamEventsLoggerProvider: FactoryProvider<Logger> = {
  provide: getLoggerToken(STREAM_EVENTS_LOGGER_SCOPE),
  useFactory: (loggerService: LoggerService, configStore: ConfigStore) => {
    loggerService.configure(configStore.getSnapshot().logging);
    return loggerService.getLogger(STREAM_EVENTS_LOGGER_SCOPE);
  },
  inject: [ LoggerService, ConfigStore ],
};

@Module({
  imports: [ ConfigModule, IoModule, CqrsModule ],
  providers: [ streamEventsLoggerProvider, StreamEventsService ],
  exports: [ StreamEventsService, ConfigModule ],
})
export class EngineModule {}
