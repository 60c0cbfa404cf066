export type PatchOperationKind = "add" | "replace";

/**
 * A single structural change against the run-state tree. `path` is a JSON
 * pointer (`""`, `/final_output`, `/logs/<segment>/streamed_output/-`).
 */
export interface PatchOperation {
  op?: PatchOperationKind;
  path: string;
  value: unknown;
}

/**
 * Operations the tracer produced together. A batch is folded as one unit and
 * the sub-runs it touches are reported together.
 */
export interface RunLogPatchInit {
  ops: readonly PatchOperation[];
}

export type PatchSourceItem = PatchOperation | RunLogPatchInit;
