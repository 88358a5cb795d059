import { firstValueFrom, fromEvent, race, Subject } from 'rxjs'
import { DEFAULT_BATCH_SIZE } from '../config'
import { IntegrityError, ValidationError } from '../errors'
import { Event, Position, SequencedEvent } from '../model'
import { DcbTransport, TransportFactory } from '../transport/transport.interface'
import {
  decodeAppendCondition,
  decodeEvent,
  decodePosition,
  decodeQuery,
  encodePosition,
  encodeSequencedEvent,
  WireAppendRequest,
  WireAppendResponse,
  WireHeadResponse,
  WireReadRequest,
  WireReadResponse,
} from '../transport/wire'

/**
 * Event store held in process memory, speaking the same wire messages as the
 * gRPC transport. Positions start at 1 and every append is one contiguous,
 * all-or-nothing batch.
 *
 * Closing the store ends its live subscriptions; the stored events remain
 * readable.
 */
export class InMemoryEventStore implements DcbTransport {
  private readonly log: SequencedEvent[] = []
  private readonly uuids = new Map<string, Position>()
  private readonly appended$ = new Subject<Position>()
  private readonly closed$ = new Subject<void>()
  private generation = 0

  /** Hands this store to `EventStoreClient.connect`. */
  readonly factory: TransportFactory = async () => this

  get headPosition(): Position | undefined {
    return this.log.at(-1)?.position
  }

  get events(): readonly SequencedEvent[] {
    return [...this.log]
  }

  async head(): Promise<WireHeadResponse> {
    return { position: this.encodedHead() }
  }

  async append(request: WireAppendRequest): Promise<WireAppendResponse> {
    if (request.events.length === 0) {
      throw new ValidationError('Cannot append an empty batch of events')
    }
    const events = request.events.map(decodeEvent)

    const stored = this.storedPositionOf(events)
    if (stored !== undefined) {
      return { position: encodePosition(stored) }
    }

    if (request.condition !== undefined) {
      const condition = decodeAppendCondition(request.condition)
      const after = condition.after === undefined ? 0 : Number(condition.after)
      if (condition.isViolatedBy(this.log.slice(after))) {
        throw new IntegrityError(`Append condition failed: ${condition}`)
      }
    }

    let position = this.headPosition ?? 0n
    for (const event of events) {
      position += 1n
      this.log.push(new SequencedEvent(event, position))
      if (event.uuid !== undefined) {
        this.uuids.set(event.uuid, position)
      }
    }
    this.appended$.next(position)
    return { position: encodePosition(position) }
  }

  async *read(request: WireReadRequest, signal: AbortSignal): AsyncIterable<WireReadResponse> {
    if (request.backwards && request.subscribe) {
      throw new ValidationError('A subscription cannot read backwards')
    }
    const query = decodeQuery(request.query)
    const batchSize = Math.max(1, request.batchSize || DEFAULT_BATCH_SIZE)
    const step = request.backwards ? -1 : 1
    const generation = this.generation
    let remaining = request.limit ?? Infinity
    let cursor = this.firstIndex(request)
    let delivered = false

    const inRange = () => (request.backwards ? cursor >= 0 : cursor < this.log.length)

    while (remaining > 0 && !signal.aborted && generation === this.generation) {
      const batch: SequencedEvent[] = []
      while (batch.length < Math.min(batchSize, remaining) && inRange()) {
        const event = this.log[cursor]
        cursor += step
        if (query.matches(event.event)) batch.push(event)
      }

      if (batch.length > 0) {
        remaining -= batch.length
        delivered = true
        yield { events: batch.map(encodeSequencedEvent), head: this.encodedHead() }
      } else if (!request.subscribe) {
        if (!delivered) yield { events: [], head: this.encodedHead() }
        return
      } else {
        await this.nextAppend(signal)
      }
    }
  }

  /** Ends every live subscription. */
  close(): void {
    this.generation += 1
    this.closed$.next()
  }

  private firstIndex({ start, backwards }: WireReadRequest): number {
    const index = start === undefined ? undefined : Number(decodePosition(start)) - 1
    if (backwards) {
      return Math.min(index ?? this.log.length - 1, this.log.length - 1)
    }
    return Math.max(index ?? 0, 0)
  }

  private encodedHead(): string | undefined {
    const head = this.headPosition
    return head === undefined ? undefined : encodePosition(head)
  }

  /**
   * Position of a batch that was already appended, recognised by the uuids of
   * its events. A batch that only partly overlaps stored events is rejected.
   */
  private storedPositionOf(events: Event[]): Position | undefined {
    const seen = new Set<string>()
    let stored: Position | undefined
    let fresh = 0
    for (const { uuid } of events) {
      if (uuid === undefined) {
        fresh += 1
        continue
      }
      if (seen.has(uuid)) {
        throw new IntegrityError(`Duplicate uuid ${uuid} in batch`)
      }
      seen.add(uuid)
      const position = this.uuids.get(uuid)
      if (position === undefined) {
        fresh += 1
      } else if (stored === undefined || position > stored) {
        stored = position
      }
    }
    if (stored !== undefined && fresh > 0) {
      throw new IntegrityError('Batch mixes events already stored with new ones')
    }
    return stored
  }

  private nextAppend(signal: AbortSignal): Promise<unknown> {
    return firstValueFrom(race(this.appended$, this.closed$, fromEvent(signal, 'abort')), {
      defaultValue: undefined,
    })
  }
}
