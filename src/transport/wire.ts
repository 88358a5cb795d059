import { z } from 'zod'
import { CorruptionError, ValidationError } from '../errors'
import {
  AppendCondition,
  Event,
  Position,
  Query,
  QueryItem,
  SequencedEvent,
  isPosition,
} from '../model'
import { formatIssues } from '../config'

/*
 * Messages exchanged with the store. They mirror proto/dcb.proto as decoded by
 * @grpc/proto-loader: camelCase fields, 64-bit integers as decimal strings and
 * bytes as Buffers.
 */

export interface WireEvent {
  eventType: string
  data: Uint8Array
  tags: string[]
  uuid?: string
}

export interface WireSequencedEvent {
  position: string
  event: WireEvent
}

export interface WireQueryItem {
  types: string[]
  tags: string[]
}

export interface WireQuery {
  items: WireQueryItem[]
}

export interface WireAppendCondition {
  failIfEventsMatch: WireQuery
  after?: string
}

export interface WireReadRequest {
  query?: WireQuery
  start?: string
  backwards: boolean
  limit?: number
  subscribe: boolean
  batchSize: number
}

export interface WireReadResponse {
  events: WireSequencedEvent[]
  head?: string
}

export interface WireAppendRequest {
  events: WireEvent[]
  condition?: WireAppendCondition
}

export interface WireAppendResponse {
  position: string
}

export interface WireHeadResponse {
  position?: string
}

const positionSchema = z.string().regex(/^\d+$/, 'position must be a decimal integer')

// proto3 leaves unset optional fields out, or reports them as null
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  schema.nullish().transform((value) => value ?? undefined)

const eventSchema = z.object({
  eventType: z.string(),
  data: z.instanceof(Uint8Array),
  tags: z.array(z.string()).default([]),
  uuid: optional(z.string()).transform((uuid) => (uuid === '' ? undefined : uuid)),
})

const sequencedEventSchema = z.object({
  position: positionSchema,
  event: eventSchema,
})

export const readResponseSchema = z.object({
  events: z.array(sequencedEventSchema).default([]),
  head: optional(positionSchema),
})

export const appendResponseSchema = z.object({
  position: positionSchema,
})

export const headResponseSchema = z.object({
  position: optional(positionSchema),
})

export function parseWire<T extends z.ZodTypeAny>(
  schema: T,
  message: unknown,
  what: string,
): z.output<T> {
  const result = schema.safeParse(message)
  if (!result.success) {
    throw new CorruptionError(`Malformed ${what}: ${formatIssues(result.error)}`)
  }
  return result.data
}

export function encodePosition(position: Position): string {
  return position.toString()
}

export function decodePosition(value: string): Position {
  if (!/^\d+$/.test(value)) {
    throw new CorruptionError(`Position is not a decimal integer: ${value}`)
  }
  const position = BigInt(value)
  if (!isPosition(position)) {
    throw new CorruptionError(`Position out of range: ${value}`)
  }
  return position
}

export function encodeEvent(event: Event): WireEvent {
  return {
    eventType: event.eventType,
    data: event.data,
    tags: [...event.tags],
    uuid: event.uuid,
  }
}

export function decodeEvent(wire: WireEvent): Event {
  try {
    return new Event(wire)
  } catch (err) {
    if (err instanceof ValidationError) {
      throw new CorruptionError(`Malformed event: ${err.message}`, err)
    }
    throw err
  }
}

export function encodeSequencedEvent(event: SequencedEvent): WireSequencedEvent {
  return { position: encodePosition(event.position), event: encodeEvent(event.event) }
}

export function decodeSequencedEvent(wire: WireSequencedEvent): SequencedEvent {
  return new SequencedEvent(decodeEvent(wire.event), decodePosition(wire.position))
}

export function encodeQuery(query: Query): WireQuery {
  return {
    items: query.items.map((item) => ({
      types: [...item.types],
      tags: [...item.tags],
    })),
  }
}

export function decodeQuery(wire: WireQuery | undefined): Query {
  if (wire === undefined) return Query.all()
  return new Query({ items: wire.items.map((item) => new QueryItem(item)) })
}

export function encodeAppendCondition(condition: AppendCondition): WireAppendCondition {
  return {
    failIfEventsMatch: encodeQuery(condition.failIfEventsMatch),
    after: condition.after === undefined ? undefined : encodePosition(condition.after),
  }
}

export function decodeAppendCondition(wire: WireAppendCondition): AppendCondition {
  return new AppendCondition({
    failIfEventsMatch: decodeQuery(wire.failIfEventsMatch),
    after: wire.after === undefined ? undefined : decodePosition(wire.after),
  })
}
