export * from "./run-log";
export * from "./stream-events";
