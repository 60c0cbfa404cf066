import { isLegacyRunType, type LegacyRunType } from "@runstream/types";
import { isPlainRecord } from "../addable/addable";

/** Retrievers, tools and LLMs report raw inputs and outputs. */
export interface LegacyRun {
  kind: "legacy";
  type: LegacyRunType;
}

/** Everything else wraps them as `{ input }` and `{ output }`. */
export interface ChainRun {
  kind: "chain";
  type: string;
}

export type RunCategory = LegacyRun | ChainRun;

export type EndOutput =
  | { kind: "emit"; value: unknown; consume: boolean }
  | { kind: "skip" };

export function categorizeRun(type: string): RunCategory {
  return isLegacyRunType(type)
    ? { kind: "legacy", type }
    : { kind: "chain", type };
}

/** Empty containers and strings count as "not known yet". */
export function hasValue(value: unknown): boolean {
  if (value === null || value === undefined) {
    return false;
  }
  if (Array.isArray(value) || typeof value === "string") {
    return value.length > 0;
  }
  if (isPlainRecord(value)) {
    return Object.keys(value).length > 0;
  }
  return true;
}

/**
 * Input to surface for a run, or `undefined` when it is not available yet.
 */
export function resolveInput(
  category: RunCategory,
  inputs: unknown
): { input: unknown } | undefined {
  switch (category.kind) {
    case "legacy":
      return hasValue(inputs) ? { input: inputs } : undefined;
    case "chain":
      return isPlainRecord(inputs) && Object.hasOwn(inputs, "input")
        ? { input: inputs.input }
        : undefined;
  }
}

export function resolveEndOutput(
  category: RunCategory,
  finalOutput: unknown
): EndOutput {
  switch (category.kind) {
    case "legacy":
      return { kind: "emit", value: finalOutput ?? null, consume: true };
    case "chain":
      if (finalOutput === null || finalOutput === undefined) {
        return { kind: "emit", value: null, consume: false };
      }
      if (isPlainRecord(finalOutput)) {
        return { kind: "emit", value: finalOutput.output ?? null, consume: true };
      }
      return { kind: "skip" };
  }
}

/**
 * Output of the whole run for the closing event. Unlike sub-runs the closing
 * event always carries an output.
 */
export function resolveRootOutput(
  category: RunCategory,
  finalOutput: unknown
): unknown {
  if (category.kind === "chain" && isPlainRecord(finalOutput)) {
    return finalOutput.output ?? null;
  }
  return finalOutput ?? null;
}
