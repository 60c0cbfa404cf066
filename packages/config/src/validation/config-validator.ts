import { Injectable } from "@nestjs/common";
import { z } from "zod";

import type { RunstreamConfig } from "../types";

const CONCURRENCY_SCHEMA = z
  .number()
  .int("must be an integer")
  .positive("must be greater than zero")
  .nullable()
  .optional();

const LOGGING_SCHEMA = z
  .object({
    level: z.enum(["silent", "fatal", "error", "warn", "info", "debug", "trace"]),
    destination: z
      .object({
        type: z.enum(["stdout", "stderr", "file"]),
        path: z.string().min(1, "must be a non-empty string").optional(),
        pretty: z.boolean().optional(),
        colorize: z.boolean().optional(),
      })
      .optional(),
    enableTimestamps: z.boolean().optional(),
  })
  .passthrough();

const EXECUTOR_SCHEMA = z
  .object({
    concurrency: CONCURRENCY_SCHEMA,
  })
  .passthrough();

const STREAM_EVENTS_SCHEMA = z
  .object({
    publishToEventBus: z.boolean({ invalid_type_error: "must be a boolean" }),
    fanOutConcurrency: CONCURRENCY_SCHEMA,
  })
  .passthrough();

@Injectable()
export class ConfigValidator {
  validate(config: RunstreamConfig): void {
    const errors: Error[] = [];

    this.capture(errors, () => this.validateSection("logging", LOGGING_SCHEMA, config.logging));
    this.capture(errors, () => this.validateSection("executor", EXECUTOR_SCHEMA, config.executor));
    this.capture(errors, () =>
      this.validateSection("streamEvents", STREAM_EVENTS_SCHEMA, config.streamEvents),
    );

    if (errors.length === 1) {
      throw errors[0];
    }

    if (errors.length > 1) {
      const message = errors.map((error) => error.message).join("\n");
      throw new AggregateError(errors, message);
    }
  }

  private capture(errors: Error[], fn: () => void): void {
    try {
      fn();
    } catch (unknownError) {
      errors.push(
        unknownError instanceof Error
          ? unknownError
          : new Error(String(unknownError)),
      );
    }
  }

  private validateSection(
    section: string,
    schema: z.ZodTypeAny,
    value: unknown,
  ): void {
    if (value === null || typeof value !== "object") {
      throw new Error(`${section} must be an object.`);
    }

    const result = schema.safeParse(value);
    if (!result.success) {
      const [issue] = result.error.issues;
      const pathSuffix = issue?.path?.length
        ? `.${issue.path.map(String).join(".")}`
        : "";
      const message = issue?.message ?? "is invalid.";
      throw new Error(`${section}${pathSuffix} ${message}`);
    }
  }
}
