import type { PatchOperation, PatchSourceItem, StreamEvent } from "@runstream/types";
import { describe, expect, it } from "vitest";
import { StreamInvariantError } from "../src/errors";
import { RunLogPatch } from "../src/run-log/run-log";
import {
  RunLogEventTranslator,
  translateRunLogPatches,
} from "../src/stream-events/run-log-event-translator";

async function* fromItems(items: PatchSourceItem[]): AsyncGenerator<PatchSourceItem> {
  for (const item of items) {
    yield item;
  }
}

async function collect(items: PatchSourceItem[]): Promise<StreamEvent[]> {
  const events: StreamEvent[] = [];
  for await (const event of translateRunLogPatches(fromItems(items))) {
    events.push(event);
  }
  return events;
}

const op = (path: string, value: unknown): PatchOperation => ({ op: "add", path, value });

describe("translateRunLogPatches", () => {
  it("brackets a streamed sub-run between the root start and end", async () => {
    const events = await collect([
      { path: "/id", value: "r1" },
      { path: "/logs/a/id", value: "s1" },
      { path: "/logs/a/streamed_output/-", value: "chunk1" },
      { path: "/logs/a/end_time", value: "t1" },
      { path: "/final_output", value: { output: "done" } },
    ]);

    expect(events).toEqual([
      { event: "on_chain_start", name: "", run_id: "r1", tags: [], metadata: {}, data: {} },
      { event: "on_chain_start", name: "a", run_id: "s1", tags: [], metadata: {}, data: {} },
      {
        event: "on_chain_stream",
        name: "a",
        run_id: "s1",
        tags: [],
        metadata: {},
        data: { chunk: "chunk1" },
      },
      {
        event: "on_chain_end",
        name: "a",
        run_id: "s1",
        tags: [],
        metadata: {},
        data: { output: null },
      },
      {
        event: "on_chain_end",
        name: "",
        run_id: "r1",
        tags: [],
        metadata: {},
        data: { output: "done" },
      },
    ]);
  });

  it("reports legacy runs with raw inputs and outputs", async () => {
    const events = await collect([
      { ops: [ op("/id", "r1"), op("/type", "chain"), op("/name", "agent") ] },
      {
        ops: [
          op("/logs/search", {
            id: "t1",
            name: "search",
            type: "tool",
            tags: [ "seq:step:1" ],
            metadata: { attempt: 1 },
            inputs: { query: "q" },
            streamed_output: [],
            final_output: null,
            end_time: null,
          }),
        ],
      },
      {
        ops: [
          op("/logs/search/final_output", { hits: 2 }),
          op("/logs/search/end_time", "t2"),
        ],
      },
    ]);

    expect(events.map((event) => [ event.event, event.data ])).toEqual([
      [ "on_chain_start", {} ],
      [ "on_tool_start", { input: { query: "q" } } ],
      [ "on_tool_end", { output: { hits: 2 }, input: { query: "q" } } ],
      [ "on_chain_end", { output: null } ],
    ]);
    expect(events[1]).toMatchObject({
      name: "search",
      run_id: "t1",
      tags: [ "seq:step:1" ],
      metadata: { attempt: 1 },
    });
    expect(events[3].name).toBe("agent");
  });

  it("unwraps input and output mappings for chain runs", async () => {
    const events = await collect([
      op("/id", "r1"),
      {
        ops: [
          op("/logs/prompt/id", "p1"),
          op("/logs/prompt/type", "prompt"),
          op("/logs/prompt/inputs", { input: "question" }),
        ],
      },
      {
        ops: [
          op("/logs/prompt/final_output", { output: "answer" }),
          op("/logs/prompt/end_time", "t"),
        ],
      },
    ]);

    expect(events[1]).toMatchObject({ event: "on_prompt_start", data: { input: "question" } });
    expect(events[2]).toMatchObject({
      event: "on_prompt_end",
      data: { output: "answer", input: "question" },
    });
  });

  it("omits the output of a chain run that ended with another shape", async () => {
    const events = await collect([
      op("/id", "r1"),
      { ops: [ op("/logs/p/id", "p1"), op("/logs/p/final_output", "plain"), op("/logs/p/end_time", "t") ] },
    ]);

    expect(events.map((event) => event.event)).toEqual([
      "on_chain_start",
      "on_chain_start",
      "on_chain_end",
      "on_chain_end",
    ]);
    expect(events[2].data).toEqual({});
  });

  it("emits a start for a sub-run first seen when it already ended", async () => {
    const events = await collect([
      op("/id", "r1"),
      { ops: [ op("/logs/fast/id", "f1"), op("/logs/fast/end_time", "t") ] },
    ]);

    expect(events.slice(1).map((event) => [ event.event, event.run_id ])).toEqual([
      [ "on_chain_start", "f1" ],
      [ "on_chain_end", "f1" ],
      [ "on_chain_end", "r1" ],
    ]);
  });

  it("emits one start and one end per sub-run with matching run ids", async () => {
    const events = await collect([
      op("/id", "r1"),
      op("/logs/a/id", "s1"),
      op("/logs/a/tags", [ "x" ]),
      op("/logs/a/metadata", { k: "v" }),
      op("/logs/a/streamed_output/-", 1),
      op("/logs/a/streamed_output/-", 2),
      op("/logs/a/end_time", "t"),
    ]);

    const subRunEvents = events.filter((event) => event.name === "a");
    const starts = subRunEvents.filter((event) => event.event === "on_chain_start");
    const ends = subRunEvents.filter((event) => event.event === "on_chain_end");

    expect(starts).toHaveLength(1);
    expect(ends).toHaveLength(1);
    expect(ends[0].run_id).toBe(starts[0].run_id);
    expect(subRunEvents.map((event) => event.data)).toEqual([
      {},
      { chunk: 1 },
      { chunk: 2 },
      { output: null },
    ]);
  });

  it("ignores later updates to a sub-run that already ended", async () => {
    const events = await collect([
      op("/id", "r1"),
      { ops: [ op("/logs/a/id", "s1"), op("/logs/a/end_time", "t") ] },
      op("/logs/a/streamed_output/-", "late"),
      op("/logs/a/metadata", { note: "after end" }),
    ]);

    expect(events.filter((event) => event.name === "a")).toHaveLength(2);
    expect(events.at(-1)?.event).toBe("on_chain_end");
  });

  it("streams root chunks after sub-run events", async () => {
    const events = await collect([
      op("/id", "r1"),
      { ops: [ op("/logs/a/id", "s1"), op("/streamed_output/-", "root chunk") ] },
    ]);

    expect(events.map((event) => [ event.event, event.name ])).toEqual([
      [ "on_chain_start", "" ],
      [ "on_chain_start", "a" ],
      [ "on_chain_stream", "" ],
      [ "on_chain_end", "" ],
    ]);
    expect(events[2].data).toEqual({ chunk: "root chunk" });
  });

  it("fails when more than one chunk is buffered", async () => {
    const pending = collect([
      op("/id", "r1"),
      op("/logs/a/id", "s1"),
      {
        ops: [
          op("/logs/a/streamed_output/-", "one"),
          op("/logs/a/streamed_output/-", "two"),
        ],
      },
    ]);

    await expect(pending).rejects.toBeInstanceOf(StreamInvariantError);
    await expect(pending).rejects.toThrow(
      "Expected exactly one chunk of streamed output, got 2 instead. Encountered in: a"
    );
  });

  it("still closes the root run when nothing set an output", async () => {
    const events = await collect([ op("/id", "r1") ]);

    expect(events.at(-1)).toEqual({
      event: "on_chain_end",
      name: "",
      run_id: "r1",
      tags: [],
      metadata: {},
      data: { output: null },
    });
  });

  it("emits only the closing event for an empty source", async () => {
    await expect(collect([])).resolves.toEqual([
      {
        event: "on_chain_end",
        name: "",
        run_id: "",
        tags: [],
        metadata: {},
        data: { output: null },
      },
    ]);
  });

  it("closes the source when the consumer stops early", async () => {
    let closed = false;
    async function* source(): AsyncGenerator<PatchSourceItem> {
      try {
        yield op("/id", "r1");
        yield op("/logs/a/id", "s1");
      } finally {
        closed = true;
      }
    }

    for await (const event of translateRunLogPatches(source())) {
      expect(event.event).toBe("on_chain_start");
      break;
    }

    expect(closed).toBe(true);
  });

  it("propagates source failures without a closing event", async () => {
    const seen: string[] = [];
    async function* source(): AsyncGenerator<PatchSourceItem> {
      yield op("/id", "r1");
      throw new Error("upstream broke");
    }

    const consume = async () => {
      for await (const event of translateRunLogPatches(source())) {
        seen.push(event.event);
      }
    };

    await expect(consume()).rejects.toThrow("upstream broke");
    expect(seen).toEqual([ "on_chain_start" ]);
  });
});

describe("RunLogEventTranslator", () => {
  it("exposes the folded run log", () => {
    const translator = new RunLogEventTranslator();

    const events = [ ...translator.process(new RunLogPatch([ op("/id", "r1"), op("/name", "root") ])) ];

    expect(events).toHaveLength(1);
    expect(translator.runLog.state).toEqual({ id: "r1", name: "root" });
  });

  it("drops streamed chunks and outputs from the run log once surfaced", () => {
    const translator = new RunLogEventTranslator();
    const chunk = { text: "x".repeat(1024) };
    const output = { text: "y".repeat(1024) };

    const events = [
      ...translator.process(op("/id", "r1")),
      ...translator.process(op("/logs/a/id", "s1")),
      ...translator.process(op("/logs/a/streamed_output/-", chunk)),
      ...translator.process({
        ops: [ op("/logs/a/final_output", { output }), op("/logs/a/end_time", "t") ],
      }),
    ];

    expect(events.map((event) => event.data)).toEqual([
      {},
      {},
      { chunk },
      { output },
    ]);
    expect(Object.keys(translator.runLog)).toEqual([ "state" ]);
    expect(translator.runLog.state).toEqual({
      id: "r1",
      logs: { a: { id: "s1", streamed_output: [], end_time: "t" } },
    });
  });

  it("refuses to finish twice or process after finishing", () => {
    const translator = new RunLogEventTranslator();
    translator.finish();

    expect(() => translator.finish()).toThrow("The translation already finished.");
    expect(() => [ ...translator.process(op("/id", "r1")) ]).toThrow(
      "Cannot process patches after the translation finished."
    );
  });
});
