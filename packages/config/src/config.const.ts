import { ConfigurableModuleBuilder } from "@nestjs/common";
import type { RuntimeOverrides } from "./types";

export const { ConfigurableModuleClass, MODULE_OPTIONS_TOKEN } =
  new ConfigurableModuleBuilder<RuntimeOverrides>().build();

export const INITIAL_CONFIG_TOKEN = Symbol("RUNSTREAM_INITIAL_CONFIG");
