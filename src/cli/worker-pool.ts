/**
 * Worker Pool
 *
 * Runs tasks with bounded concurrency. N workers pull from a shared queue
 * until it is empty; results come back in task order.
 *
 * Usage:
 * ```typescript
 * const { results, errors } = await runWorkerPool(
 *   files,
 *   async (file) => await processFile(file),
 *   { concurrency: 2, onError: ({ task, error }) => logger.error(`${task}: ${error.message}`) }
 * )
 * ```
 */

type TaskProcessor<T, R> = (task: T, index: number) => Promise<R>

interface WorkerErrorInfo<T> {
  readonly task: T
  readonly index: number
  readonly error: Error
}

interface WorkerPoolOptions<T, R> {
  /** Number of concurrent workers (default 1) */
  readonly concurrency?: number | undefined
  /** Called after each task completes successfully */
  readonly onComplete?: ((result: R, index: number) => void) | undefined
  /** Called on task error. Return false to stop handing out new tasks. */
  readonly onError?: ((info: WorkerErrorInfo<T>) => boolean | undefined) | undefined
}

export interface WorkerPoolResult<R> {
  /** Results in original task order (undefined for failed tasks) */
  readonly results: ReadonlyArray<R | undefined>
  readonly errors: ReadonlyArray<{ readonly index: number; readonly error: Error }>
}

export async function runWorkerPool<T, R>(
  tasks: readonly T[],
  processor: TaskProcessor<T, R>,
  options: WorkerPoolOptions<T, R> = {}
): Promise<WorkerPoolResult<R>> {
  const results: Array<R | undefined> = Array.from({ length: tasks.length }, () => undefined)
  const errors: Array<{ index: number; error: Error }> = []

  let nextIndex = 0
  let stopped = false

  async function worker(): Promise<void> {
    while (!stopped) {
      // Claim the next task
      const index = nextIndex++
      if (index >= tasks.length) return

      const task = tasks[index]
      if (task === undefined) return

      try {
        const result = await processor(task, index)
        results[index] = result
        options.onComplete?.(result, index)
      } catch (e) {
        const error = e instanceof Error ? e : new Error(String(e))
        errors.push({ index, error })
        if (options.onError?.({ task, index, error }) === false) {
          stopped = true
        }
      }
    }
  }

  const workerCount = Math.max(1, Math.min(options.concurrency ?? 1, tasks.length))
  await Promise.all(Array.from({ length: workerCount }, () => worker()))

  return { results, errors }
}
