import { EventEmitter } from 'node:events'

/**
 * FIFO conduit between the stream reader and the matcher. The reader is the
 * only producer and the matcher the only consumer, so the queue itself is the
 * sole point where the two meet.
 *
 * Events: `chunk` after every accepted push, `drain` when the queue falls
 * back below the high water mark, `close` once.
 */
export class HandoffChannel extends EventEmitter {
  private queue: string[] = []
  private closed = false
  private closeReason: Error | undefined
  private saturated = false

  constructor(private highWaterMark = 256) {
    super()
  }

  get size(): number {
    return this.queue.length
  }

  get isClosed(): boolean {
    return this.closed
  }

  /** True once the channel is closed and every queued chunk has been received. */
  get isExhausted(): boolean {
    return this.closed && this.queue.length === 0
  }

  get reason(): Error | undefined {
    return this.closeReason
  }

  /**
   * Queues a chunk. Returns false when the producer should hold off until
   * `drain`, or when the channel is already closed.
   */
  push(chunk: string): boolean {
    if (this.closed) return false
    if (chunk.length > 0) {
      this.queue.push(chunk)
      this.emit('chunk')
    }
    if (this.queue.length >= this.highWaterMark) {
      this.saturated = true
      return false
    }
    return true
  }

  tryReceive(): string | undefined {
    const chunk = this.queue.shift()
    if (chunk !== undefined && this.saturated && this.queue.length < this.highWaterMark) {
      this.saturated = false
      this.emit('drain')
    }
    return chunk
  }

  /**
   * Resolves after `ms`, or earlier when a chunk is pushed or the channel
   * closes. Never rejects.
   */
  waitForChunk(ms: number): Promise<void> {
    if (this.queue.length > 0 || this.closed || ms <= 0) return Promise.resolve()
    return new Promise((resolve) => {
      const wake = (): void => {
        clearTimeout(timer)
        this.off('chunk', wake)
        this.off('close', wake)
        resolve()
      }
      const timer = setTimeout(wake, ms)
      this.once('chunk', wake)
      this.once('close', wake)
    })
  }

  close(reason?: Error): void {
    if (this.closed) return
    this.closed = true
    this.closeReason = reason
    this.emit('close', reason)
  }
}
