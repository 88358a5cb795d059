import { Logger } from 'pino'
import { ReadOptions } from './client/client'
import { ReadResponse } from './client/read-response'
import { createLogger } from './logger'
import { Position, Query, SequencedEvent } from './model'

export enum ExceptionResolution {
  Ignore,
  Abort,
  Retry,
}

export class NoSuchPositionException extends Error {}

/** The parts of `EventStoreClient` a dispatcher reads through. */
export interface EventSource {
  read(options: ReadOptions): ReadResponse
  head(): Promise<Position | undefined>
}

export interface DispatcherSubscription {
  unsubscribe(): void
  /** Settles when the subscription ends, with the error that ended it, if any. */
  readonly closed: Promise<Error | undefined>
}

export type HandleException = (
  subscription: DispatcherSubscription | undefined,
  error: Error,
  attempts: number,
) => Promise<ExceptionResolution>
export type HandleSuccess = (subscription: DispatcherSubscription) => Promise<void>

export interface SubscriptionOptions {
  id: string
  query: Query
  restartWhenAhead: boolean
  beforeRestarting: () => Promise<void>
}

const defaultOptions = (): SubscriptionOptions => ({
  id: 'subscription',
  query: Query.all(),
  restartWhenAhead: true,
  beforeRestarting: () => Promise.resolve(),
})

type Handler = (event: SequencedEvent) => Promise<void>

function asError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

/**
 * Feeds the live tail of a query to a handler, starting after the last
 * position the handler processed.
 */
export class Dispatcher {
  private static readonly abortExceptionResolutionPromise = Promise.resolve(
    ExceptionResolution.Abort,
  )

  constructor(
    private readonly source: EventSource,
    private readonly logger: Logger = createLogger('dcb-dispatcher'),
  ) {}

  public exceptionHandler: HandleException = () =>
    Dispatcher.abortExceptionResolutionPromise
  public successHandler: HandleSuccess = () => Promise.resolve()

  async subscribe(
    lastProcessedPosition: Position | undefined,
    handler: Handler,
    options: Partial<SubscriptionOptions> = {},
  ): Promise<DispatcherSubscription> {
    const subscriptionOptions: SubscriptionOptions = {
      ...defaultOptions(),
      ...options,
    }

    try {
      await this.ensureKnownPosition(lastProcessedPosition)
      return this.startSubscription(lastProcessedPosition, handler, subscriptionOptions)
    } catch (err) {
      if (err instanceof NoSuchPositionException) {
        const result = await this.handleUnknownCheckpoint(handler, subscriptionOptions)
        if (result == undefined)
          throw new Error('Unable to restart subscription after unknown checkpoint')
        return result
      }
      throw err
    }
  }

  private async ensureKnownPosition(position: Position | undefined) {
    if (position === undefined) return
    const head = await this.source.head()
    if (head === undefined || position > head) {
      throw new NoSuchPositionException(
        `No position ${position} in a store whose head is ${head ?? 'empty'}`,
      )
    }
  }

  private startSubscription(
    lastProcessedPosition: Position | undefined,
    handler: Handler,
    options: SubscriptionOptions,
  ): DispatcherSubscription {
    const response = this.source.read({
      query: options.query,
      start: lastProcessedPosition === undefined ? undefined : lastProcessedPosition + 1n,
      subscribe: true,
    })
    let closed: Promise<Error | undefined> = Promise.resolve(undefined)
    const subscription: DispatcherSubscription = {
      unsubscribe: () => response.cancel(),
      get closed() {
        return closed
      },
    }
    closed = this.pump(response, handler, subscription, options.id)
    return subscription
  }

  private async pump(
    response: ReadResponse,
    handler: Handler,
    subscription: DispatcherSubscription,
    id: string,
  ): Promise<Error | undefined> {
    try {
      for await (const event of response) {
        const aborted = await this.handleEvent(event, handler, subscription)
        if (aborted) return aborted
      }
      return undefined
    } catch (err) {
      const error = asError(err)
      this.logger.error({ err: error, subscription: id }, 'Event subscription failed')
      return error
    }
  }

  private async handleEvent(
    event: SequencedEvent,
    handler: Handler,
    subscription: DispatcherSubscription,
  ): Promise<Error | undefined> {
    let abortedWith: Error | undefined
    await this.executeWithPolicy(
      async () => {
        await handler(event)
        await this.successHandler(subscription)
      },
      (error) => {
        this.logger.error(
          { err: error, position: event.position.toString() },
          'Projection exception was not handled. Event subscription has been cancelled',
        )
        abortedWith = error
        subscription.unsubscribe()
      },
      subscription,
    )
    return abortedWith
  }

  private async handleUnknownCheckpoint(
    handler: Handler,
    options: SubscriptionOptions,
  ) {
    if (options.restartWhenAhead) {
      return await this.executeWithPolicy(
        async () => {
          await options.beforeRestarting()
          return await this.subscribe(undefined, handler, options)
        },
        (error) => {
          this.logger.error({ err: error, subscription: options.id }, 'Failed to restart projection')
        },
        undefined,
        () => this.subscribe(undefined, handler, options),
      )
    }
    throw new Error('Unknown checkpoint. Not restarting')
  }

  private async executeWithPolicy<T>(
    action: () => Promise<T>,
    abort: (err: Error) => void,
    subscription?: DispatcherSubscription,
    ignore?: () => T | Promise<T>,
  ): Promise<T | undefined> {
    let attempts = 0
    for (;;) {
      try {
        ++attempts
        return await action()
      } catch (err) {
        const error = asError(err)
        const resolution = await this.exceptionHandler(subscription, error, attempts)
        switch (resolution) {
          case ExceptionResolution.Ignore:
            return ignore?.()
          case ExceptionResolution.Abort:
            abort(error)
            return undefined
          case ExceptionResolution.Retry:
            break
        }
      }
    }
  }
}
