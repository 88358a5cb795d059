import { Logger } from 'pino'
import { CorruptionError, ValidationError, translateError } from '../errors'
import { Position, Query, SequencedEvent } from '../model'
import { decodePosition, decodeSequencedEvent, WireReadResponse } from '../transport/wire'

export type BatchSource = (signal: AbortSignal) => AsyncIterable<WireReadResponse>

export interface ReadBounds {
  query: Query
  start?: Position
  backwards: boolean
  limit?: number
}

/**
 * Lazily produced result of a read. Batches are pulled from the store one at
 * a time as the caller consumes events; a subscription suspends iteration
 * until new events arrive.
 *
 * A response can be iterated once. `cancel()` ends iteration without an error
 * and releases the underlying stream.
 */
export class ReadResponse implements AsyncIterable<SequencedEvent> {
  private readonly controller = new AbortController()
  private started = false
  private lastHead: Position | undefined
  private readonly onAbort = () => this.cancel()

  constructor(
    private readonly source: BatchSource,
    private readonly bounds: ReadBounds,
    private readonly logger: Logger,
    private readonly signal?: AbortSignal,
  ) {}

  /** Head of the store as reported alongside the most recent batch. */
  get head(): Position | undefined {
    return this.lastHead
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted || this.signal?.aborted === true
  }

  cancel(): void {
    this.controller.abort()
  }

  [Symbol.asyncIterator](): AsyncIterator<SequencedEvent> {
    if (this.started) {
      throw new ValidationError('A read response can only be iterated once')
    }
    this.started = true
    return this.events()
  }

  async toArray(): Promise<SequencedEvent[]> {
    const events: SequencedEvent[] = []
    for await (const event of this) {
      events.push(event)
    }
    return events
  }

  private async *events(): AsyncGenerator<SequencedEvent, void, undefined> {
    const { limit } = this.bounds
    const abort = this.controller.signal
    let count = 0
    let previous: Position | undefined

    // The caller's signal is only listened to while iterating.
    if (this.signal?.aborted) this.cancel()
    this.signal?.addEventListener('abort', this.onAbort, { once: true })
    try {
      if (limit === 0 || abort.aborted) return
      for await (const batch of this.source(abort)) {
        if (batch.head !== undefined) {
          this.lastHead = decodePosition(batch.head)
        }
        for (const wire of batch.events) {
          if (abort.aborted) return
          const event = decodeSequencedEvent(wire)
          this.verify(event, previous)
          previous = event.position
          yield event
          if (limit !== undefined && ++count >= limit) return
        }
        if (abort.aborted) return
      }
    } catch (err) {
      if (abort.aborted) return
      const error = translateError(err)
      this.logger.debug({ err: error, delivered: count }, 'Read failed')
      throw error
    } finally {
      this.signal?.removeEventListener('abort', this.onAbort)
      this.controller.abort()
      this.logger.debug({ delivered: count }, 'Read finished')
    }
  }

  private verify(event: SequencedEvent, previous: Position | undefined) {
    const { query, start, backwards } = this.bounds
    const { position } = event
    if (previous !== undefined && (backwards ? position >= previous : position <= previous)) {
      throw new CorruptionError(`Event at position ${position} is out of order after ${previous}`)
    }
    if (start !== undefined && (backwards ? position > start : position < start)) {
      throw new CorruptionError(
        `Event at position ${position} lies ${backwards ? 'after' : 'before'} the requested start ${start}`,
      )
    }
    if (!query.matches(event.event)) {
      throw new CorruptionError(`Event at position ${position} does not match ${query}`)
    }
  }
}
