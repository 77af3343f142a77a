type Waiter<T> = {
  resolve: (result: IteratorResult<T>) => void
  reject: (error: unknown) => void
}

/**
 * Single-consumer async queue. The producer pushes without waiting; the
 * consumer iterates with `for await` and sees values in push order.
 */
export class EventChannel<T> implements AsyncIterable<T> {
  private readonly buffer: T[] = []
  private waiters: Waiter<T>[] = []
  private closed = false
  private failure: {error: unknown} | undefined

  push(value: T): void {
    if (this.closed) return
    const waiter = this.waiters.shift()
    if (waiter) {
      waiter.resolve({value, done: false})
      return
    }
    this.buffer.push(value)
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    for (const waiter of this.waiters) waiter.resolve({value: undefined, done: true})
    this.waiters = []
  }

  /** Ends the channel with an error, delivered after anything already buffered. */
  fail(error: unknown): void {
    if (this.closed) return
    this.failure = {error}
    this.closed = true
    for (const waiter of this.waiters) waiter.reject(error)
    this.waiters = []
  }

  get isClosed(): boolean {
    return this.closed
  }

  next(): Promise<IteratorResult<T>> {
    if (this.buffer.length > 0) {
      const value = this.buffer[0]
      this.buffer.shift()
      return Promise.resolve({value, done: false})
    }
    if (this.failure) return Promise.reject(this.failure.error)
    if (this.closed) return Promise.resolve({value: undefined, done: true})
    return new Promise((resolve, reject) => {
      this.waiters.push({resolve, reject})
    })
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {next: () => this.next()}
  }
}
