import type { ReadResult } from '../shared/types'
import type { HandoffChannel } from './handoff-channel'
import { ReadInProgressError } from './errors'

export interface MatchHit {
  /** Offset just past the consumed prefix. */
  end: number
  patternIndex?: number
}

/** Inspects the whole buffer and reports where a read should stop, if anywhere. */
export type MatchFinder = (buffer: string) => MatchHit | null

/**
 * Holds everything received from the stream that no read has returned yet.
 * Only the consumer side touches the buffer: chunks reach it exclusively
 * through `drainAvailable`, and only a finished read shortens it.
 */
export class BufferedMatcher {
  private buffer = ''
  private reading = false

  constructor(
    private handoff: HandoffChannel,
    private pollIntervalMs = 250,
  ) {}

  get pending(): string {
    return this.buffer
  }

  get isReading(): boolean {
    return this.reading
  }

  /**
   * Appends one queued chunk. With nothing queued, idles for one poll
   * quantum (never past `deadline`), returning early if a chunk arrives.
   * Resolves true when a chunk was appended.
   */
  async drainAvailable(deadline?: number): Promise<boolean> {
    const chunk = this.handoff.tryReceive()
    if (chunk !== undefined) {
      this.buffer += chunk
      return true
    }
    const idle = deadline === undefined
      ? this.pollIntervalMs
      : Math.min(this.pollIntervalMs, deadline - Date.now())
    await this.handoff.waitForChunk(idle)
    return false
  }

  /**
   * Polls until `find` reports a hit or the timeout expires. On a hit the
   * prefix up to the hit is returned and the rest stays buffered. Otherwise
   * the whole buffer is returned and the buffer is left empty. A hit whose
   * end lies outside the buffer counts as no hit.
   */
  async readUntil(find: MatchFinder, timeoutSeconds: number): Promise<ReadResult> {
    if (this.reading) throw new ReadInProgressError()
    this.reading = true
    try {
      const deadline = Date.now() + timeoutSeconds * 1000

      while (Date.now() < deadline) {
        const hit = find(this.buffer)
        if (hit && hit.end >= 0 && hit.end <= this.buffer.length) {
          const output = this.consume(hit.end)
          return hit.patternIndex === undefined
            ? { output, status: 'matched' }
            : { output, status: 'matched', patternIndex: hit.patternIndex }
        }
        if (this.handoff.isExhausted) {
          return { output: this.consume(this.buffer.length), status: 'closed' }
        }
        await this.drainAvailable(deadline)
      }

      return { output: this.consume(this.buffer.length), status: 'no-match' }
    } finally {
      this.reading = false
    }
  }

  private consume(end: number): string {
    const prefix = this.buffer.slice(0, end)
    this.buffer = this.buffer.slice(end)
    return prefix
  }
}
