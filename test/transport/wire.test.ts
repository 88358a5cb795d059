import {
  AppendCondition,
  CorruptionError,
  decodePosition,
  decodeQuery,
  decodeSequencedEvent,
  encodeAppendCondition,
  encodeEvent,
  Event,
  headResponseSchema,
  parseWire,
  Query,
  readResponseSchema,
} from '../../src'
import { dcbError } from '../utils'

test('a read response from the wire decodes into sequenced events', () => {
  const response = parseWire(
    readResponseSchema,
    {
      events: [
        {
          position: '7',
          event: { eventType: 'Created', data: Buffer.from('x'), tags: ['a'], uuid: '' },
        },
      ],
      head: '9',
    },
    'read response',
  )
  const event = decodeSequencedEvent(response.events[0])

  expect(response.head).toBe('9')
  expect(event.position).toBe(7n)
  expect(event.event.equals(new Event({ eventType: 'Created', data: 'x', tags: ['a'] }))).toBe(
    true,
  )
  expect(event.event.uuid).toBeUndefined()
})

test('unset optional fields decode as absent', () => {
  expect(parseWire(headResponseSchema, { position: null }, 'head response')).toEqual({
    position: undefined,
  })
  expect(parseWire(readResponseSchema, {}, 'read response')).toEqual({
    events: [],
    head: undefined,
  })
})

test('a malformed message is corruption', () => {
  expect(() =>
    parseWire(readResponseSchema, { events: [{ position: 'x' }] }, 'read response'),
  ).toThrow(CorruptionError)
  expect(() => parseWire(headResponseSchema, { position: '-1' }, 'head response')).toThrow(
    'Malformed head response: position: position must be a decimal integer',
  )
})

test('positions outside the unsigned 64-bit range are corruption', () => {
  expect(decodePosition('18446744073709551615')).toBe(2n ** 64n - 1n)
  expect(() => decodePosition('18446744073709551616')).toThrow(
    dcbError(CorruptionError, 'Position out of range: 18446744073709551616'),
  )
  expect(() => decodePosition('abc')).toThrow(CorruptionError)
})

test('an event read back with a version 7 uuid decodes', () => {
  const uuid = '01890A5D-AC96-774B-BCCE-B302099A8057'

  const sequenced = decodeSequencedEvent({
    position: '3',
    event: { eventType: 'Created', data: new Uint8Array([1]), tags: ['order:1'], uuid },
  })

  expect(sequenced.position).toBe(3n)
  expect(sequenced.event.uuid).toBe('01890a5d-ac96-774b-bcce-b302099a8057')
  expect(
    sequenced.event.equals(
      new Event({ eventType: 'Created', data: new Uint8Array([1]), tags: ['order:1'], uuid }),
    ),
  ).toBe(true)
})

test('an invalid event from the store is corruption', () => {
  expect(() =>
    decodeSequencedEvent({
      position: '1',
      event: { eventType: 'Created', data: new Uint8Array(), tags: [], uuid: 'nope' },
    }),
  ).toThrow(dcbError(CorruptionError, 'Malformed event: Invalid UUID: nope'))
})

test('an append condition encodes its query and boundary', () => {
  const condition = new AppendCondition({
    failIfEventsMatch: Query.of({ types: ['Cancelled'], tags: ['order:1'] }),
    after: 5n,
  })

  expect(encodeAppendCondition(condition)).toEqual({
    failIfEventsMatch: { items: [{ types: ['Cancelled'], tags: ['order:1'] }] },
    after: '5',
  })
})

test('events encode with their bytes and tags', () => {
  expect(encodeEvent(new Event({ eventType: 'Created', data: 'hi', tags: ['t'] }))).toEqual({
    eventType: 'Created',
    data: new Uint8Array([0x68, 0x69]),
    tags: ['t'],
    uuid: undefined,
  })
})

test('an absent query decodes as the universal query', () => {
  expect(decodeQuery(undefined).isUniversal).toBe(true)
})
