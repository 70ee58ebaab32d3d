import type { Logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface QueueTask<T> {
  /** Unique identifier for this task */
  id: string;
  /** Function that performs the actual work */
  execute: () => Promise<T>;
}

export interface QueueOptions {
  /** Maximum number of concurrent tasks */
  concurrency: number;
  /** Logger instance for queue operations */
  logger: Logger;
  /** Millisecond clock used for latency stats */
  now?: () => number;
}

export type TaskResult<T> =
  | { id: string; status: "fulfilled"; value: T }
  | { id: string; status: "rejected"; error: Error };

export interface QueueStats {
  /** Number of tasks waiting to be processed */
  pending: number;
  /** Number of tasks currently being processed */
  active: number;
  /** Number of tasks that resolved */
  completed: number;
  /** Number of tasks that rejected */
  failed: number;
  /** Average processing time in milliseconds */
  averageLatencyMs: number;
}

export interface ProcessingQueue<T> {
  /** Add a task to the queue */
  enqueue(task: QueueTask<T>): void;
  /** Get current queue statistics */
  getStats(): QueueStats;
  /**
   * Wait until every enqueued task has settled.
   * Resolves with the results in settlement order.
   */
  drain(): Promise<TaskResult<T>[]>;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create a bounded worker queue.
 * A rejected task is recorded and never blocks or cancels the others.
 */
export function createQueue<T>(options: QueueOptions): ProcessingQueue<T> {
  const { logger } = options;
  const now = options.now ?? Date.now;

  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    throw new RangeError(
      `Queue concurrency must be a positive integer, got ${options.concurrency}`
    );
  }
  const concurrency = options.concurrency;

  const pending: QueueTask<T>[] = [];
  const active = new Set<string>();
  const results: TaskResult<T>[] = [];
  const drainWaiters: Array<(results: TaskResult<T>[]) => void> = [];

  let completed = 0;
  let failed = 0;
  let totalLatency = 0;

  function getStats(): QueueStats {
    const settled = completed + failed;
    return {
      pending: pending.length,
      active: active.size,
      completed,
      failed,
      averageLatencyMs: settled > 0 ? Math.round(totalLatency / settled) : 0,
    };
  }

  function checkDrainComplete(): void {
    if (pending.length > 0 || active.size > 0) return;
    const snapshot = [...results];
    for (const resolve of drainWaiters.splice(0)) {
      resolve(snapshot);
    }
  }

  function processNext(): void {
    while (active.size < concurrency && pending.length > 0) {
      const task = pending.shift();
      if (task) {
        void processTask(task);
      }
    }
    checkDrainComplete();
  }

  async function processTask(task: QueueTask<T>): Promise<void> {
    const startTime = now();

    active.add(task.id);
    logger.debug("Task started", { taskId: task.id, active: active.size });

    try {
      const value = await task.execute();
      completed++;
      results.push({ id: task.id, status: "fulfilled", value });
      logger.debug("Task completed", {
        taskId: task.id,
        latencyMs: now() - startTime,
      });
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      failed++;
      results.push({ id: task.id, status: "rejected", error: err });
      logger.error("Task failed", { taskId: task.id, error: err.message });
    } finally {
      totalLatency += now() - startTime;
      active.delete(task.id);
      processNext();
    }
  }

  function enqueue(task: QueueTask<T>): void {
    pending.push(task);
    logger.debug("Task enqueued", {
      taskId: task.id,
      pendingCount: pending.length,
    });
    processNext();
  }

  function drain(): Promise<TaskResult<T>[]> {
    return new Promise((resolve) => {
      drainWaiters.push(resolve);
      checkDrainComplete();
    });
  }

  return {
    enqueue,
    getStats,
    drain,
  };
}
