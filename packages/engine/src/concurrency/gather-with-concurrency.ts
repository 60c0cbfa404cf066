import { InvalidConcurrencyLimitError, TaskNotAdmittedError } from "../errors";
import { Semaphore } from "./semaphore";

export type Task<T> = () => Promise<T>;

export interface GatherOptions {
  /** Aborting stops admitting tasks and rejects with the signal's reason. */
  signal?: AbortSignal;
}

/**
 * Runs `task` once the gate admits it. `shouldStart` is consulted after
 * admission; a task refused at that point never runs.
 */
export function gatedTask<T>(
  semaphore: Semaphore,
  task: Task<T>,
  shouldStart: () => boolean = () => true
): Promise<T> {
  return semaphore.use(() => {
    if (!shouldStart()) {
      throw new TaskNotAdmittedError();
    }
    return task();
  });
}

function raceAbort<T>(pending: Promise<T>, signal: AbortSignal | undefined): Promise<T> {
  if (!signal) {
    return pending;
  }

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<never>((_, reject) => {
    onAbort = () => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
  });

  return Promise.race([ pending, aborted ]).finally(() => {
    if (onAbort) {
      signal.removeEventListener("abort", onAbort);
    }
  });
}

/**
 * Runs every task and resolves with their results in input order.
 *
 * With a `limit`, at most that many tasks run at once; the rest wait on the
 * gate without having started. The first failure rejects the call with the
 * original error: siblings already running finish on their own but their
 * results are dropped, and tasks still waiting are never started.
 */
export async function gatherWithConcurrency<T>(
  limit: number | null | undefined,
  tasks: readonly Task<T>[],
  options: GatherOptions = {}
): Promise<T[]> {
  const { signal } = options;

  if (limit !== null && limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
    throw new InvalidConcurrencyLimitError(limit);
  }

  signal?.throwIfAborted();

  if (limit === null || limit === undefined) {
    return raceAbort(Promise.all(tasks.map((task) => task())), signal);
  }

  const semaphore = new Semaphore(limit);
  let failed = false;
  const admit = () => !failed && !(signal?.aborted ?? false);

  // The flag is raised before the failing task gives its slot back, so the
  // waiter that receives the slot is already refused.
  const gated = tasks.map((task) =>
    gatedTask(
      semaphore,
      async () => {
        try {
          return await task();
        } catch (error) {
          failed = true;
          throw error;
        }
      },
      admit
    )
  );

  return raceAbort(Promise.all(gated), signal);
}
