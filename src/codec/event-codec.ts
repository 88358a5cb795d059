import { instanceToPlain, plainToInstance } from 'class-transformer'
import { CorruptionError, ValidationError } from '../errors'
import { Event, QueryItem } from '../model'
import { Type } from '../type'

export interface EncodeOptions {
  tags?: readonly string[]
  uuid?: string
}

const encoder = new TextEncoder()
const decoder = new TextDecoder('utf-8', { fatal: true })

/**
 * Maps event classes to event types and their JSON data.
 *
 * The event type of a class is its name unless `withEventTypeFromConstructor`
 * says otherwise. Register classes before encoding or decoding them.
 */
export class EventCodec {
  private readonly types = new Map<string, Type>()
  private readonly names = new Map<Function, string>()
  private eventTypeFromConstructor = (constructor: Type) => constructor.name

  withEventTypeFromConstructor(fn: (constructor: Type) => string) {
    if (this.types.size > 0) {
      throw new ValidationError('Event type naming must be set before registering events')
    }
    this.eventTypeFromConstructor = fn
    return this
  }

  register(...Events: Type[]) {
    for (const EventClass of Events) {
      const eventType = this.eventTypeFromConstructor(EventClass)
      const existing = this.types.get(eventType)
      if (existing !== undefined && existing !== EventClass) {
        throw new ValidationError(`Event type ${eventType} is already registered to ${existing.name}`)
      }
      this.types.set(eventType, EventClass)
      this.names.set(EventClass, eventType)
    }
    return this
  }

  eventTypeOf(EventClass: Type): string {
    const eventType = this.names.get(EventClass)
    if (eventType === undefined) {
      throw new ValidationError(`${EventClass.name} is not a registered event`)
    }
    return eventType
  }

  isRegistered(eventType: string): boolean {
    return this.types.has(eventType)
  }

  /** A query item selecting the given events, optionally narrowed by tags. */
  queryItem(Events: readonly Type[], tags: readonly string[] = []): QueryItem {
    return new QueryItem({ types: Events.map((EventClass) => this.eventTypeOf(EventClass)), tags })
  }

  encode(payload: object, { tags = [], uuid }: EncodeOptions = {}): Event {
    const eventType = this.names.get(payload.constructor)
    if (eventType === undefined) {
      throw new ValidationError(`${payload.constructor.name} is not a registered event`)
    }
    const data = encoder.encode(JSON.stringify(instanceToPlain(payload)))
    return new Event({ eventType, data, tags, uuid })
  }

  /** Decodes the data of a registered event type; undefined for unknown types. */
  decode(event: Event): object | undefined {
    const EventClass = this.types.get(event.eventType)
    if (EventClass === undefined) return undefined

    let plain: unknown
    try {
      plain = JSON.parse(decoder.decode(event.data))
    } catch (err) {
      throw new CorruptionError(`Data of ${event.eventType} is not valid JSON`, err)
    }
    if (typeof plain !== 'object' || plain === null || Array.isArray(plain)) {
      throw new CorruptionError(`Data of ${event.eventType} is not a JSON object`)
    }
    return plainToInstance(EventClass, plain)
  }
}
