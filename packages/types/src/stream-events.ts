export const LEGACY_RUN_TYPES = ["retriever", "tool", "llm"] as const;

export type LegacyRunType = (typeof LEGACY_RUN_TYPES)[number];

export type StreamEventKind = "start" | "stream" | "end";

export type StreamEventName = `on_${string}_${StreamEventKind}`;

export interface StreamEventData {
  input?: unknown;
  output?: unknown;
  chunk?: unknown;
}

/**
 * Lifecycle event derived from the run-state tree for the root run or one of
 * its sub-runs.
 */
export interface StreamEvent {
  event: StreamEventName;
  /** Name of the run that produced the event. */
  name: string;
  run_id: string;
  tags: string[];
  metadata: Record<string, unknown>;
  data: StreamEventData;
}

export type StreamEventConsumer = (event: StreamEvent) => Promise<void> | void;

export function isLegacyRunType(type: string): type is LegacyRunType {
  return LEGACY_RUN_TYPES.some((legacy) => legacy === type);
}

export function formatStreamEventName(
  type: string,
  kind: StreamEventKind
): StreamEventName {
  return `on_${type}_${kind}`;
}
