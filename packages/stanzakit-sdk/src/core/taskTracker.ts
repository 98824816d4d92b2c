/**
 * Tracked set of running handler tasks.
 *
 * Every inbound handler body runs as a task with its own AbortSignal.
 * Teardown aborts all of them at once and waits for them to settle, bounded
 * by a grace period. Task failures are logged here; they never reach the
 * inbound drain or the teardown caller.
 *
 * @module Core/TaskTracker
 */
import { createLogger, describeError, type Logger } from './logger'

interface TrackedTask {
  name: string
  controller: AbortController
  promise: Promise<void>
}

export class TaskTracker {
  private tasks = new Set<TrackedTask>()
  private log: Logger

  constructor(log: Logger = createLogger('tasks')) {
    this.log = log
  }

  get size(): number {
    return this.tasks.size
  }

  /**
   * Run `run` as a tracked task. It is invoked synchronously, so handlers
   * start in arrival order; only its asynchronous part runs detached.
   */
  spawn(name: string, run: (signal: AbortSignal) => void | Promise<void>): void {
    const controller = new AbortController()
    let result: void | Promise<void>
    try {
      result = run(controller.signal)
    } catch (err) {
      this.log.error(`Task ${name} failed: ${describeError(err)}`)
      return
    }
    if (!(result instanceof Promise)) return

    const task: TrackedTask = {
      name,
      controller,
      promise: result.then(
        () => {
          this.tasks.delete(task)
        },
        (err: unknown) => {
          this.tasks.delete(task)
          if (controller.signal.aborted) {
            this.log.debug(`Task ${name} ended after cancellation: ${describeError(err)}`)
          } else {
            this.log.error(`Task ${name} failed: ${describeError(err)}`)
          }
        }
      ),
    }
    this.tasks.add(task)
  }

  /**
   * Abort every running task and wait up to `graceMs` for them to finish.
   * Tasks still running afterwards are logged and forgotten.
   */
  async cancelAll(graceMs: number): Promise<void> {
    if (this.tasks.size === 0) return
    const running = [...this.tasks]
    for (const task of running) {
      task.controller.abort()
    }

    let timer: ReturnType<typeof setTimeout> | undefined
    const timedOut = await Promise.race([
      Promise.all(running.map((task) => task.promise)).then(() => false),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(true), graceMs)
      }),
    ])
    clearTimeout(timer)

    if (timedOut) {
      const names = running.filter((task) => this.tasks.has(task)).map((task) => task.name)
      this.log.warn(`${names.length} task(s) still running after ${graceMs}ms: ${names.join(', ')}`)
    }
    for (const task of running) {
      this.tasks.delete(task)
    }
  }
}
