import { Inject, Injectable, Optional } from "@nestjs/common";
import { EventBus } from "@nestjs/cqrs";
import { ConfigStore } from "@runstream/config";
import { InjectLogger } from "@runstream/io";
import type {
  PatchSourceItem,
  StreamEvent,
  StreamEventConsumer,
} from "@runstream/types";
import type { Logger } from "pino";
import { Observable } from "rxjs";
import {
  gatherWithConcurrency,
  type GatherOptions,
  type Task,
} from "../concurrency/gather-with-concurrency";
import { RunStreamEventEmitted } from "./run-stream-event-emitted.event";
import { translateRunLogPatches } from "./run-log-event-translator";

export interface StreamEventsOptions {
  /** Overrides `streamEvents.publishToEventBus` for this stream. */
  publishToEventBus?: boolean;
}

export interface FanOutOptions extends StreamEventsOptions, GatherOptions {
  /** Overrides `streamEvents.fanOutConcurrency`; `null` removes the ceiling. */
  concurrency?: number | null;
}

@Injectable()
export class StreamEventsService {
  constructor(
    @Inject(ConfigStore) private readonly configStore: ConfigStore,
    @InjectLogger("stream-events") private readonly logger: Logger,
    @Optional() @Inject(EventBus) private readonly eventBus?: EventBus
  ) {}

  async *toEventStream(
    source: AsyncIterable<PatchSourceItem>,
    options: StreamEventsOptions = {}
  ): AsyncGenerator<StreamEvent, void, undefined> {
    const publish =
      options.publishToEventBus ??
      this.configStore.getSnapshot().streamEvents.publishToEventBus;
    if (publish && !this.eventBus) {
      this.logger.warn("Event bus publishing requested without an EventBus");
    }

    this.logger.debug({ publish }, "Run log translation started");
    for await (const event of translateRunLogPatches(source, {
      logger: this.logger,
    })) {
      if (publish) {
        this.eventBus?.publish(new RunStreamEventEmitted(event));
      }
      yield event;
    }
  }

  toObservable(
    source: AsyncIterable<PatchSourceItem>,
    options: StreamEventsOptions = {}
  ): Observable<StreamEvent> {
    return new Observable<StreamEvent>((subscriber) => {
      const iterator = this.toEventStream(source, options);
      let closed = false;

      const pump = async (): Promise<void> => {
        try {
          while (!closed) {
            const result = await iterator.next();
            if (closed) {
              return;
            }
            if (result.done) {
              subscriber.complete();
              return;
            }
            subscriber.next(result.value);
          }
        } catch (error) {
          if (!closed) {
            subscriber.error(error);
          }
        }
      };
      void pump();

      return () => {
        closed = true;
        iterator.return(undefined).catch((error: unknown) => {
          this.logger.warn({ err: error }, "Failed to close run log source");
        });
      };
    });
  }

  async collect(
    source: AsyncIterable<PatchSourceItem>,
    options: StreamEventsOptions = {}
  ): Promise<StreamEvent[]> {
    const events: StreamEvent[] = [];
    for await (const event of this.toEventStream(source, options)) {
      events.push(event);
    }
    return events;
  }

  /**
   * Translates `source` once and hands every event to each consumer. The
   * consumers of one event must all settle before the next event is pulled.
   *
   * @returns the number of events delivered.
   */
  async fanOut(
    source: AsyncIterable<PatchSourceItem>,
    consumers: readonly StreamEventConsumer[],
    options: FanOutOptions = {}
  ): Promise<number> {
    const concurrency =
      options.concurrency !== undefined
        ? options.concurrency
        : this.configStore.getSnapshot().streamEvents.fanOutConcurrency;

    let delivered = 0;
    for await (const event of this.toEventStream(source, options)) {
      const deliveries = consumers.map(
        (consumer): Task<void> =>
          async () => {
            await consumer(event);
          }
      );
      await gatherWithConcurrency(concurrency, deliveries, {
        signal: options.signal,
      });
      delivered += 1;
    }

    this.logger.debug(
      { delivered, consumers: consumers.length },
      "Fan-out finished"
    );
    return delivered;
  }

  /** {@link gatherWithConcurrency} under the configured executor ceiling. */
  gather<T>(tasks: readonly Task<T>[], options: GatherOptions = {}): Promise<T[]> {
    const { concurrency } = this.configStore.getSnapshot().executor;
    return gatherWithConcurrency(concurrency, tasks, options);
  }
}
