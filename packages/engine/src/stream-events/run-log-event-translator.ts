import {
  formatStreamEventName,
  type PatchSourceItem,
  type StreamEvent,
  type StreamEventData,
  type StreamEventKind,
} from "@runstream/types";
import type { Logger } from "pino";
import { StreamInvariantError } from "../errors";
import { RunLogPatch, type RunLog } from "../run-log/run-log";
import {
  categorizeRun,
  resolveEndOutput,
  resolveInput,
  resolveRootOutput,
} from "./run-category";
import { RunStateSession, type RunView } from "./run-state-session";

type SubRunPhase = "running" | "ended";

export interface RunLogEventTranslatorOptions {
  logger?: Logger;
}

function classify(run: RunView): StreamEventKind {
  if (run.end_time !== null) {
    return "end";
  }
  return run.streamed_output.length > 0 ? "stream" : "start";
}

function buildEvent(
  run: RunView,
  kind: StreamEventKind,
  data: StreamEventData
): StreamEvent {
  return {
    event: formatStreamEventName(run.type, kind),
    name: run.name,
    run_id: run.id ?? "",
    tags: [ ...run.tags ],
    metadata: run.metadata,
    data,
  };
}

function takeSingleChunk(run: RunView): unknown {
  const count = run.streamed_output.length;
  if (count !== 1) {
    throw new StreamInvariantError(run.name, count);
  }
  return run.streamed_output[0];
}

/**
 * Turns run-log patches into lifecycle events for one run and its sub-runs.
 *
 * Each sub-run gets exactly one start event, a stream event per chunk and
 * exactly one end event. Sub-runs touched by the same batch are reported in
 * first-touch order, which callers must not rely on.
 */
export class RunLogEventTranslator {
  private readonly session = new RunStateSession();
  private readonly phases = new Map<string, SubRunPhase>();
  private readonly logger?: Logger;
  private rootStarted = false;
  private finished = false;

  constructor(options: RunLogEventTranslatorOptions = {}) {
    this.logger = options.logger;
  }

  get runLog(): RunLog {
    return this.session.runLog;
  }

  *process(item: PatchSourceItem): Generator<StreamEvent, void, undefined> {
    if (this.finished) {
      throw new Error("Cannot process patches after the translation finished.");
    }

    const patch = RunLogPatch.from(item);
    this.session.fold(patch);

    if (!this.rootStarted) {
      const root = this.session.root();
      if (root.id !== null) {
        this.rootStarted = true;
        yield {
          event: formatStreamEventName(root.type, "start"),
          name: root.name,
          run_id: root.id,
          tags: [],
          metadata: {},
          data: {},
        };
      }
    }

    for (const segment of patch.touchedSubRuns()) {
      yield* this.processSubRun(segment);
    }

    const root = this.session.root();
    if (root.streamed_output.length > 0) {
      const chunk = takeSingleChunk(root);
      this.session.consume([ "streamed_output" ], []);
      yield buildEvent(root, "stream", { chunk });
    }
  }

  /**
   * Closing event for the whole run. Tags and metadata are always empty here.
   */
  finish(): StreamEvent {
    if (this.finished) {
      throw new Error("The translation already finished.");
    }
    this.finished = true;

    const root = this.session.root();
    const category = categorizeRun(root.type);
    this.logger?.debug(
      { runId: root.id, subRuns: this.phases.size },
      "Run log translation finished"
    );

    return {
      event: formatStreamEventName(root.type, "end"),
      name: root.name,
      run_id: root.id ?? "",
      tags: [],
      metadata: {},
      data: { output: resolveRootOutput(category, root.final_output) },
    };
  }

  private *processSubRun(segment: string): Generator<StreamEvent, void, undefined> {
    const run = this.session.subRun(segment);
    if (!run || run.id === null) {
      this.logger?.trace({ segment }, "Sub-run has no id yet");
      return;
    }

    const phase = this.phases.get(segment);
    if (phase === "ended") {
      this.logger?.debug({ segment, runId: run.id }, "Ignoring update for ended sub-run");
      return;
    }

    const kind = classify(run);

    if (phase === undefined) {
      this.phases.set(segment, "running");
      yield this.startEvent(run);
      if (kind === "start") {
        return;
      }
    } else if (kind === "start") {
      this.logger?.trace({ segment, runId: run.id }, "Suppressing repeated start");
      return;
    }

    if (kind === "stream") {
      yield this.streamEvent(segment, run);
      return;
    }

    this.phases.set(segment, "ended");
    yield this.endEvent(segment, run);
  }

  private startEvent(run: RunView): StreamEvent {
    const input = resolveInput(categorizeRun(run.type), run.inputs);
    return buildEvent(run, "start", input ? { input: input.input } : {});
  }

  private streamEvent(segment: string, run: RunView): StreamEvent {
    const chunk = takeSingleChunk(run);
    this.session.consume([ "logs", segment, "streamed_output" ], []);
    return buildEvent(run, "stream", { chunk });
  }

  private endEvent(segment: string, run: RunView): StreamEvent {
    const category = categorizeRun(run.type);
    const data: StreamEventData = {};

    const output = resolveEndOutput(category, run.final_output);
    if (output.kind === "emit") {
      data.output = output.value;
      if (output.consume) {
        this.session.consume([ "logs", segment, "final_output" ]);
      }
    }

    const input = resolveInput(category, run.inputs);
    if (input) {
      data.input = input.input;
      this.session.consume([ "logs", segment, "inputs" ]);
    }

    return buildEvent(run, "end", data);
  }
}

/**
 * Translates an async sequence of patches. Closing the returned iterator
 * closes `source`; the closing root event is only produced once `source`
 * completes.
 */
export async function* translateRunLogPatches(
  source: AsyncIterable<PatchSourceItem>,
  options: RunLogEventTranslatorOptions = {}
): AsyncGenerator<StreamEvent, void, undefined> {
  const translator = new RunLogEventTranslator(options);
  for await (const item of source) {
    yield* translator.process(item);
  }
  yield translator.finish();
}
