/**
 * Rate Limiter
 *
 * Serializes upstream calls and keeps a fixed minimum gap between them.
 * The gap is paid after every call, whether it succeeded, failed or
 * found nothing.
 */

export type Sleep = (ms: number) => Promise<void>

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms))

export class RateLimiter {
  private queue: Promise<void> = Promise.resolve()

  constructor(
    private readonly delayMs: number,
    private readonly wait: Sleep = sleep
  ) {}

  /**
   * Run a task once every earlier task has settled and its delay has elapsed.
   */
  schedule<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task)
    this.queue = run.then(
      () => this.pause(),
      () => this.pause()
    )
    return run
  }

  /**
   * Resolves once every scheduled task and its trailing delay are done.
   */
  idle(): Promise<void> {
    return this.queue
  }

  private async pause(): Promise<void> {
    if (this.delayMs > 0) {
      await this.wait(this.delayMs)
    }
  }
}
