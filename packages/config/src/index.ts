export * from "./config.const";
export * from "./config.module";
export * from "./config.service";
export * from "./config.store";
export * from "./defaults";
export * from "./runtime-env";
export * from "./runtime-overrides";
export * from "./types";
export * from "./validation/config-validator";
