import { isPlainRecord } from "../addable/addable";
import { PatchPathError } from "../errors";
import type { RunStateRecord } from "../run-log/json-pointer";
import { RunLog, RunLogPatch, foldPatch } from "../run-log/run-log";

const DEFAULT_RUN_TYPE = "chain";

export interface RunView {
  id: string | null;
  name: string;
  type: string;
  tags: string[];
  metadata: Record<string, unknown>;
  inputs: unknown;
  final_output: unknown;
  streamed_output: unknown[];
  end_time: unknown;
}

export function readRun(record: RunStateRecord, fallbackName: string): RunView {
  const { id, name, type, tags, metadata } = record;
  return {
    id: id === null || id === undefined ? null : String(id),
    name: typeof name === "string" ? name : fallbackName,
    type: typeof type === "string" && type.length > 0 ? type : DEFAULT_RUN_TYPE,
    tags: Array.isArray(tags)
      ? tags.filter((tag): tag is string => typeof tag === "string")
      : [],
    metadata: isPlainRecord(metadata) ? { ...metadata } : {},
    inputs: record.inputs,
    final_output: record.final_output,
    streamed_output: Array.isArray(record.streamed_output)
      ? record.streamed_output
      : [],
    end_time: record.end_time ?? null,
  };
}

export function readPath(state: RunStateRecord, tokens: readonly string[]): unknown {
  let current: unknown = state;
  for (const token of tokens) {
    if (!isPlainRecord(current)) {
      return undefined;
    }
    current = current[token];
  }
  return current;
}

/**
 * Takes the value at `tokens` out of the run log. The slot is removed, or
 * reset to `drained` when one is given.
 */
export function consumeField(
  runLog: RunLog,
  tokens: readonly string[],
  drained?: unknown[]
): { value: unknown; runLog: RunLog } {
  const value = readPath(runLog.state, tokens);
  const next = runLog.edit(tokens, (container, token) => {
    if (Array.isArray(container)) {
      throw new PatchPathError(`/${tokens.join("/")}`, "cannot consume an array element");
    }
    if (drained === undefined) {
      Reflect.deleteProperty(container, token);
    } else {
      container[token] = drained;
    }
  });
  return { value, runLog: next };
}

/**
 * The run-state tree of a single translation. Nothing outside the session
 * holds a reference to it.
 */
export class RunStateSession {
  private current = RunLog.empty();

  get runLog(): RunLog {
    return this.current;
  }

  fold(patch: RunLogPatch): void {
    this.current = foldPatch(this.current, patch);
  }

  root(): RunView {
    return readRun(this.current.state, "");
  }

  subRun(segment: string): RunView | undefined {
    const record = readPath(this.current.state, [ "logs", segment ]);
    return isPlainRecord(record) ? readRun(record, segment) : undefined;
  }

  consume(tokens: readonly string[], drained?: unknown[]): unknown {
    const { value, runLog } = consumeField(this.current, tokens, drained);
    this.current = runLog;
    return value;
  }
}
