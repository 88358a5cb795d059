import { firstValueFrom, Subject } from 'rxjs'
import { take, toArray } from 'rxjs/operators'
import {
  Dispatcher,
  ExceptionResolution,
  Query,
  SequencedEvent,
} from '../src'
import { cancelled, connect, created, silentLogger } from './utils'

async function setup() {
  const { store, client } = await connect()
  const dispatcher = new Dispatcher(client, silentLogger)
  const handled = new Subject<SequencedEvent>()
  const handler = jest.fn(async (event: SequencedEvent) => {
    handled.next(event)
  })
  const positions = (count: number) =>
    firstValueFrom(
      handled.pipe(
        take(count),
        toArray(),
      ),
    ).then((events) => events.map((e) => e.position))
  return { store, client, dispatcher, handler, positions }
}

test('dispatcher restarts when ahead', async () => {
  const { client, dispatcher, handler, positions } = await setup()
  await client.append([created('1')])
  const beforeRestarting = jest.fn(() => Promise.resolve())

  const received = positions(1)
  const subscription = await dispatcher.subscribe(5n, handler, {
    beforeRestarting,
  })

  expect(await received).toEqual([1n])
  expect(beforeRestarting).toHaveBeenCalledTimes(1)
  subscription.unsubscribe()
  expect(await subscription.closed).toBeUndefined()
})

test('dispatcher refuses an unknown checkpoint when not restarting', async () => {
  const { dispatcher, handler } = await setup()

  await expect(
    dispatcher.subscribe(1n, handler, { restartWhenAhead: false }),
  ).rejects.toThrow('Unknown checkpoint. Not restarting')
  expect(handler).not.toHaveBeenCalled()
})

test('dispatcher resumes after the last processed position', async () => {
  const { client, dispatcher, handler, positions } = await setup()
  await client.append([created('1'), created('2'), created('3')])

  const received = positions(2)
  const subscription = await dispatcher.subscribe(2n, handler)
  await client.append([created('4')])

  expect(await received).toEqual([3n, 4n])
  subscription.unsubscribe()
  await subscription.closed
})

test('dispatcher only delivers events matching its query', async () => {
  const { client, dispatcher, handler, positions } = await setup()
  await client.append([created('1'), cancelled('1'), created('2')])

  const received = positions(2)
  const subscription = await dispatcher.subscribe(undefined, handler, {
    query: Query.of({ types: ['Created'] }),
  })

  expect(await received).toEqual([1n, 3n])
  subscription.unsubscribe()
  await subscription.closed
})

test('dispatcher follows the exception policy', async () => {
  const { client, dispatcher } = await setup()
  const failure = new Error('failure')
  const handler = jest.fn().mockRejectedValueOnce(failure)
  await client.append([created('1'), created('2')])

  const subscription = await dispatcher.subscribe(undefined, handler)

  expect(await subscription.closed).toBe(failure)
  expect(handler).toHaveBeenCalledTimes(1)
})

test('dispatcher retries when the exception handler asks to', async () => {
  const { client, dispatcher } = await setup()
  const failure = new Error('failure')
  const handler = jest
    .fn()
    .mockRejectedValueOnce(failure)
    .mockRejectedValueOnce(failure)
    .mockResolvedValue(undefined)
  const attempts: number[] = []
  dispatcher.exceptionHandler = async (_subscription, _error, attempt) => {
    attempts.push(attempt)
    return ExceptionResolution.Retry
  }
  const succeeded = new Subject<void>()
  dispatcher.successHandler = async () => succeeded.next()
  await client.append([created('1')])

  const done = firstValueFrom(succeeded)
  const subscription = await dispatcher.subscribe(undefined, handler)
  await done

  expect(attempts).toEqual([1, 2])
  expect(handler).toHaveBeenCalledTimes(3)
  subscription.unsubscribe()
  expect(await subscription.closed).toBeUndefined()
})

test('dispatcher skips events whose failures are ignored', async () => {
  const { client, dispatcher } = await setup()
  const seen: bigint[] = []
  const handled = new Subject<void>()
  const handler = jest.fn(async (event: SequencedEvent) => {
    if (event.position === 1n) throw new Error('failure')
    seen.push(event.position)
    handled.next()
  })
  dispatcher.exceptionHandler = async () => ExceptionResolution.Ignore
  await client.append([created('1'), created('2')])

  const done = firstValueFrom(handled)
  const subscription = await dispatcher.subscribe(undefined, handler)
  await done

  expect(seen).toEqual([2n])
  subscription.unsubscribe()
  await subscription.closed
})
