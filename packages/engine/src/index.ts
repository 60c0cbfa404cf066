export * from "./addable/addable";
export * from "./concurrency/gather-with-concurrency";
export * from "./concurrency/semaphore";
export * from "./engine.module";
export * from "./errors";
export * from "./run-log/json-pointer";
export * from "./run-log/run-log";
export * from "./stream-events/run-category";
export * from "./stream-events/run-log-event-translator";
export * from "./stream-events/run-state-session";
export * from "./stream-events/run-stream-event-emitted.event";
export * from "./stream-events/stream-events.service";
