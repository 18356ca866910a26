/**
 * Runs tasks one at a time in submission order. A task starts only after
 * the previous one settled, whether it resolved or rejected.
 */
export class SerialQueue {
  private tail: Promise<void> = Promise.resolve()

  run<T>(task: () => Promise<T>): Promise<T> {
    const result = this.tail.then(task)

    // Failures reach the caller through `result`; the chain only orders tasks.
    this.tail = result.then(
      () => undefined,
      () => undefined,
    )

    return result
  }
}
