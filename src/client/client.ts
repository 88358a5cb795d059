import { Observable } from 'rxjs'
import { Logger } from 'pino'
import { ClientOptions, resolveClientOptions, ResolvedClientOptions } from '../config'
import { translateError, ValidationError } from '../errors'
import { createLogger } from '../logger'
import {
  AppendCondition,
  assertPosition,
  Event,
  Position,
  Query,
  SequencedEvent,
} from '../model'
import { GrpcTransport } from '../transport/grpc/grpc.transport'
import { DcbTransport, TransportFactory } from '../transport/transport.interface'
import {
  decodePosition,
  encodeAppendCondition,
  encodeEvent,
  encodePosition,
  encodeQuery,
  WireAppendRequest,
  WireReadRequest,
} from '../transport/wire'
import { ReadResponse } from './read-response'

const MAX_LIMIT = 2 ** 32 - 1

export interface ReadOptions {
  /** Events to select. Absent selects every event. */
  query?: Query
  /** First position to consider, inclusive. */
  start?: Position
  backwards?: boolean
  /** Maximum number of events delivered, subscriptions included. */
  limit?: number
  /** Keep delivering events as they are appended. Not allowed with `backwards`. */
  subscribe?: boolean
  signal?: AbortSignal
}

export interface ConnectDependencies {
  transportFactory?: TransportFactory
  logger?: Logger
}

export class EventStoreClient {
  private constructor(
    private readonly transport: DcbTransport,
    private readonly options: ResolvedClientOptions,
    private readonly logger: Logger,
  ) {}

  static async connect(
    options: ClientOptions,
    {
      transportFactory = GrpcTransport.connect,
      logger = createLogger(),
    }: ConnectDependencies = {},
  ): Promise<EventStoreClient> {
    const resolved = resolveClientOptions(options)
    let transport: DcbTransport
    try {
      transport = await transportFactory(resolved, logger)
    } catch (err) {
      throw translateError(err)
    }
    logger.debug({ url: resolved.url, batchSize: resolved.batchSize }, 'Connected to event store')
    return new EventStoreClient(transport, resolved, logger)
  }

  get batchSize(): number {
    return this.options.batchSize
  }

  read({
    query,
    start,
    backwards = false,
    limit,
    subscribe = false,
    signal,
  }: ReadOptions = {}): ReadResponse {
    if (backwards && subscribe) {
      throw new ValidationError('A subscription cannot read backwards')
    }
    if (start !== undefined) {
      assertPosition(start, 'start')
    }
    if (limit !== undefined && !(Number.isInteger(limit) && limit >= 0 && limit <= MAX_LIMIT)) {
      throw new ValidationError(`limit must be an unsigned 32-bit integer, got ${limit}`)
    }

    const request: WireReadRequest = {
      query: query === undefined ? undefined : encodeQuery(query),
      start: start === undefined ? undefined : encodePosition(start),
      backwards,
      limit,
      subscribe,
      batchSize: this.options.batchSize,
    }
    return new ReadResponse(
      (abort) => this.transport.read(request, abort),
      { query: query ?? Query.all(), start, backwards, limit },
      this.logger,
      signal,
    )
  }

  /** The read as an Observable. Unsubscribing cancels the read. */
  observe(options: Omit<ReadOptions, 'signal'> = {}): Observable<SequencedEvent> {
    return new Observable<SequencedEvent>((subscriber) => {
      const response = this.read(options)
      const pump = async () => {
        for await (const event of response) {
          subscriber.next(event)
        }
        subscriber.complete()
      }
      pump().catch((err: unknown) => subscriber.error(err))
      return () => response.cancel()
    })
  }

  async head(): Promise<Position | undefined> {
    try {
      const { position } = await this.transport.head()
      return position === undefined ? undefined : decodePosition(position)
    } catch (err) {
      throw translateError(err)
    }
  }

  /**
   * Appends the events as one atomic batch and returns the position of the
   * last of them. With a condition, the store rejects the whole batch with an
   * IntegrityError when an event matching `failIfEventsMatch` exists after
   * `condition.after`.
   */
  async append(events: readonly Event[], condition?: AppendCondition): Promise<Position> {
    if (events.length === 0) {
      throw new ValidationError('Cannot append an empty batch of events')
    }
    const request: WireAppendRequest = {
      events: events.map(encodeEvent),
      condition: condition === undefined ? undefined : encodeAppendCondition(condition),
    }

    try {
      const { position } = await this.transport.append(request)
      const head = decodePosition(position)
      this.logger.debug({ count: events.length, position: head.toString() }, 'Appended events')
      return head
    } catch (err) {
      const error = translateError(err)
      this.logger.debug({ err: error, count: events.length }, 'Append rejected')
      throw error
    }
  }

  close(): void {
    this.transport.close()
  }
}
