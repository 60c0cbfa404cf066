/**
 * Raised when a run buffers anything other than exactly one chunk between two
 * emissions. The patch producer flushes chunks one at a time, so this always
 * points at a producer bug.
 */
export class StreamInvariantError extends Error {
  readonly runName: string;
  readonly chunkCount: number;

  constructor(runName: string, chunkCount: number) {
    super(
      `Expected exactly one chunk of streamed output, got ${chunkCount} instead. Encountered in: ${runName}`
    );
    this.name = "StreamInvariantError";
    this.runName = runName;
    this.chunkCount = chunkCount;
  }
}

export class PatchPathError extends Error {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Cannot apply patch at "${path}": ${reason}`);
    this.name = "PatchPathError";
    this.path = path;
  }
}

export class InvalidConcurrencyLimitError extends Error {
  readonly limit: unknown;

  constructor(limit: unknown) {
    super(`Concurrency limit must be a positive integer, received ${String(limit)}.`);
    this.name = "InvalidConcurrencyLimitError";
    this.limit = limit;
  }
}

/**
 * Settles a task that was still waiting on the admission gate when the
 * surrounding call failed or was aborted. Callers never observe it.
 */
export class TaskNotAdmittedError extends Error {
  constructor() {
    super("Task was not admitted because the surrounding call already settled.");
    this.name = "TaskNotAdmittedError";
  }
}
