import type { PollingConfig } from "./config.js";
import { RemoteFailureError, TimeoutError } from "./errors.js";
import type { EmbeddingTaskStatus, IndexTask, VideoApiClient } from "./video-api-client.js";

export interface WaitOptions<T> {
  doneStatuses: readonly string[];
  failedStatuses: readonly string[];
  intervalMs?: number;
  timeoutMs?: number;
  /** Called with every status observed, including the terminal one. */
  onUpdate?: (value: T) => void;
  signal?: AbortSignal;
  /** Should reject once `signal` aborts. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  now?: () => number;
}

export const DEFAULT_POLL_INTERVAL_MS = 5000;
export const DEFAULT_POLL_TIMEOUT_MS = 30 * 60 * 1000;

export function sleepUnlessAborted(ms: number, signal?: AbortSignal) {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export async function waitForDone<T extends { status: string }>(
  fetchStatus: () => Promise<T>,
  {
    doneStatuses,
    failedStatuses,
    intervalMs = DEFAULT_POLL_INTERVAL_MS,
    timeoutMs = DEFAULT_POLL_TIMEOUT_MS,
    onUpdate,
    signal,
    sleep = sleepUnlessAborted,
    now = Date.now
  }: WaitOptions<T>
): Promise<T> {
  const startedAt = now();

  for (;;) {
    signal?.throwIfAborted();

    const value = await fetchStatus();
    onUpdate?.(value);

    if (doneStatuses.includes(value.status)) return value;
    if (failedStatuses.includes(value.status)) throw new RemoteFailureError(value.status);

    const elapsedMs = now() - startedAt;
    if (elapsedMs >= timeoutMs) throw new TimeoutError(elapsedMs);

    await sleep(intervalMs, signal);
  }
}

type TaskWaitOptions<T> = Pick<WaitOptions<T>, "onUpdate" | "signal" | "sleep" | "now"> & Partial<PollingConfig>;

export const waitForIndexTask = (client: VideoApiClient, taskId: string, options: TaskWaitOptions<IndexTask> = {}) =>
  waitForDone(() => client.getIndexTask(taskId), {
    ...options,
    doneStatuses: ["ready"],
    failedStatuses: ["failed"]
  });

export const waitForEmbeddingTask = (
  client: VideoApiClient,
  taskId: string,
  options: TaskWaitOptions<EmbeddingTaskStatus> = {}
) =>
  waitForDone(() => client.getEmbeddingTaskStatus(taskId), {
    ...options,
    doneStatuses: ["ready"],
    failedStatuses: ["failed"]
  });
