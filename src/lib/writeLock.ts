/**
 * Runs async tasks one at a time, in call order. A failed task does not
 * block the ones queued behind it.
 */
export class WriteLock {
  private tail: Promise<unknown> = Promise.resolve()

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task, task)
    this.tail = result.catch(() => undefined)
    return result
  }
}
