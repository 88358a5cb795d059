import {
  encodeEvent,
  InMemoryEventStore,
  IntegrityError,
  ValidationError,
  WireReadRequest,
  WireReadResponse,
} from '../../src'
import { cancelled, created } from '../utils'

const signal = () => new AbortController().signal

async function collect(store: InMemoryEventStore, request: WireReadRequest) {
  const batches: WireReadResponse[] = []
  for await (const batch of store.read(request, signal())) batches.push(batch)
  return batches
}

test('positions start at 1 and the head follows the last append', async () => {
  const store = new InMemoryEventStore()
  expect(await store.head()).toEqual({ position: undefined })

  await expect(store.append({ events: [encodeEvent(created('1'))] })).resolves.toEqual({
    position: '1',
  })
  await store.append({ events: [encodeEvent(created('2')), encodeEvent(created('3'))] })

  expect(store.headPosition).toBe(3n)
  expect(store.events.map((e) => e.position)).toEqual([1n, 2n, 3n])
})

test('reads are split into batches of the requested size', async () => {
  const store = new InMemoryEventStore()
  for (const order of ['1', '2', '3']) {
    await store.append({ events: [encodeEvent(created(order))] })
  }

  const batches = await collect(store, { backwards: false, subscribe: false, batchSize: 2 })

  expect(batches.map((b) => b.events.map((e) => e.position))).toEqual([['1', '2'], ['3']])
  expect(batches.map((b) => b.head)).toEqual(['3', '3'])
})

test('a read without matches yields one empty batch carrying the head', async () => {
  const store = new InMemoryEventStore()
  await store.append({ events: [encodeEvent(created('1'))] })

  const batches = await collect(store, {
    query: { items: [{ types: ['Cancelled'], tags: [] }] },
    backwards: false,
    subscribe: false,
    batchSize: 10,
  })

  expect(batches).toEqual([{ events: [], head: '1' }])
})

test('requests the client would reject are rejected here too', async () => {
  const store = new InMemoryEventStore()

  await expect(store.append({ events: [] })).rejects.toBeInstanceOf(ValidationError)
  await expect(
    collect(store, { backwards: true, subscribe: true, batchSize: 10 }),
  ).rejects.toBeInstanceOf(ValidationError)
})

test('a failed condition reports the condition and stores nothing', async () => {
  const store = new InMemoryEventStore()
  await store.append({ events: [encodeEvent(cancelled('1'))] })

  await expect(
    store.append({
      events: [encodeEvent(created('2'))],
      condition: { failIfEventsMatch: { items: [{ types: ['Cancelled'], tags: [] }] } },
    }),
  ).rejects.toBeInstanceOf(IntegrityError)
  expect(store.headPosition).toBe(1n)
})

test('closing keeps the stored events readable', async () => {
  const store = new InMemoryEventStore()
  await store.append({ events: [encodeEvent(created('1'))] })

  store.close()

  const batches = await collect(store, { backwards: false, subscribe: false, batchSize: 10 })
  expect(batches).toHaveLength(1)
  expect(batches[0].events[0].position).toBe('1')
})
