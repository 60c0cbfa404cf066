import type { PatchOperation, PatchSourceItem } from "@runstream/types";
import { combine, type Addable } from "../addable/addable";
import {
  applyOperations,
  editContainer,
  parsePointer,
  type ContainerEdit,
  type RunStateRecord,
} from "./json-pointer";

const SUB_RUN_PREFIX = "/logs/";

/** A batch of operations produced together by the tracer. */
export class RunLogPatch implements Addable<RunLogPatch> {
  readonly ops: readonly PatchOperation[];

  constructor(ops: readonly PatchOperation[]) {
    this.ops = ops;
  }

  static from(item: PatchSourceItem): RunLogPatch {
    if (item instanceof RunLogPatch) {
      return item;
    }
    return "ops" in item ? new RunLogPatch(item.ops) : new RunLogPatch([ item ]);
  }

  concat(other: RunLogPatch): RunLogPatch {
    if (!(other instanceof RunLogPatch)) {
      throw new TypeError("A RunLogPatch can only be combined with another RunLogPatch.");
    }
    return new RunLogPatch([ ...this.ops, ...other.ops ]);
  }

  /**
   * Distinct sub-run segments this batch writes to, in first-touch order.
   */
  touchedSubRuns(): string[] {
    const segments = new Set<string>();
    for (const operation of this.ops) {
      if (operation.path.startsWith(SUB_RUN_PREFIX)) {
        segments.add(parsePointer(operation.path)[1]);
      }
    }
    return [ ...segments ];
  }
}

/**
 * Cumulative state of a run. Combining a log with a patch applies the patch;
 * the operations themselves are not kept, so a value drained from `state`
 * is no longer referenced by the log.
 */
export class RunLog implements Addable<RunLogPatch, RunLog> {
  readonly state: RunStateRecord;

  constructor(state: RunStateRecord) {
    this.state = state;
  }

  static empty(): RunLog {
    return new RunLog({});
  }

  concat(other: RunLogPatch): RunLog {
    if (!(other instanceof RunLogPatch)) {
      throw new TypeError("A RunLog can only be combined with a RunLogPatch.");
    }
    return new RunLog(applyOperations(this.state, other.ops));
  }

  /** State edited at `tokens` outside of any patch. */
  edit(tokens: readonly string[], edit: ContainerEdit): RunLog {
    return new RunLog(editContainer(this.state, tokens, edit));
  }
}

export function foldPatch(runLog: RunLog, patch: RunLogPatch): RunLog {
  const next = combine(runLog, patch);
  if (!(next instanceof RunLog)) {
    throw new TypeError("Folding a patch into a run log did not produce a run log.");
  }
  return next;
}
