interface Waiter {
  readonly resolve: (line: string | null) => void
  readonly reject: (error: unknown) => void
  readonly detach: () => void
}

const abortReason = (signal: AbortSignal): unknown =>
  signal.reason ?? new Error("Read aborted")

/**
 * Forward-only buffer between a child's output streams and its readers.
 *
 * Lines are handed out exactly once, oldest first. A reader that aborts is
 * removed from the wait list before any line reaches it, so an abandoned read
 * never consumes output meant for the next reader.
 */
export class LineQueue {
  private readonly buffered: string[] = []
  private readonly waiters: Waiter[] = []
  private closed = false

  get pending(): number {
    return this.buffered.length
  }

  /** Buffered lines not yet handed to a reader. */
  peek(): readonly string[] {
    return [...this.buffered]
  }

  push(line: string): void {
    if (this.closed) return
    const waiter = this.waiters.shift()
    if (waiter) {
      waiter.detach()
      waiter.resolve(line)
      return
    }
    this.buffered.push(line)
  }

  close(): void {
    if (this.closed) return
    this.closed = true
    for (const waiter of this.waiters.splice(0)) {
      waiter.detach()
      waiter.resolve(null)
    }
  }

  /** Resolves with the next line, or `null` once closed and drained. */
  next(signal?: AbortSignal): Promise<string | null> {
    if (signal?.aborted) {
      return Promise.reject(abortReason(signal))
    }
    const line = this.buffered.shift()
    if (line !== undefined) {
      return Promise.resolve(line)
    }
    if (this.closed) {
      return Promise.resolve(null)
    }
    return new Promise<string | null>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter)
        if (index >= 0) this.waiters.splice(index, 1)
        reject(signal ? abortReason(signal) : new Error("Read aborted"))
      }
      const waiter: Waiter = {
        resolve,
        reject,
        detach: () => signal?.removeEventListener("abort", onAbort),
      }
      signal?.addEventListener("abort", onAbort, { once: true })
      this.waiters.push(waiter)
    })
  }
}
