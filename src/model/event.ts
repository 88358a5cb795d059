import { ValidationError } from '../errors'

export interface EventProps {
  eventType: string
  data?: Uint8Array | string
  tags?: readonly string[]
  /**
   * Idempotency key: any 128-bit UUID, hyphenated or as 32 hex digits,
   * optionally braced or prefixed with `urn:uuid:`.
   */
  uuid?: string
}

const encoder = new TextEncoder()
const decoder = new TextDecoder()

/**
 * A domain event as it is appended to the store.
 *
 * Events are immutable: `data` and `tags` are copied on construction and the
 * instance is frozen. A `uuid` is normalised to its lower-case hyphenated form
 * so that an event read back from the store compares equal to the original.
 */
export class Event {
  readonly eventType: string
  readonly data: Uint8Array
  readonly tags: readonly string[]
  readonly uuid: string | undefined

  constructor({ eventType, data = new Uint8Array(), tags = [], uuid }: EventProps) {
    this.eventType = eventType
    this.data = typeof data === 'string' ? encoder.encode(data) : Uint8Array.from(data)
    this.tags = Object.freeze([...tags])
    this.uuid = uuid === undefined ? undefined : canonicalUuid(uuid)
    Object.freeze(this)
  }

  /** The data decoded as UTF-8, for presentation. */
  text(): string {
    return decoder.decode(this.data)
  }

  hasTag(tag: string): boolean {
    return this.tags.includes(tag)
  }

  equals(other: Event): boolean {
    return (
      this.eventType === other.eventType &&
      this.uuid === other.uuid &&
      sameStrings(this.tags, other.tags) &&
      sameBytes(this.data, other.data)
    )
  }

  toString(): string {
    return `Event(type=${this.eventType}, tags=${JSON.stringify(this.tags)}, uuid=${this.uuid ?? 'none'})`
  }
}

const UUID_HEX = /^[0-9a-f]{32}$/i

/**
 * The lower-case hyphenated form of a UUID. Every version and variant is
 * accepted, only the 128-bit hex shape is checked.
 */
export function canonicalUuid(value: string): string {
  let hex = value
  if (hex.toLowerCase().startsWith('urn:uuid:')) {
    hex = hex.slice('urn:uuid:'.length)
  } else if (hex.startsWith('{') && hex.endsWith('}')) {
    hex = hex.slice(1, -1)
  }
  if (hex.length === 36) {
    if ([8, 13, 18, 23].some((i) => hex[i] !== '-')) {
      throw new ValidationError(`Invalid UUID: ${value}`)
    }
    hex = hex.replace(/-/g, '')
  }
  if (!UUID_HEX.test(hex)) {
    throw new ValidationError(`Invalid UUID: ${value}`)
  }
  const lower = hex.toLowerCase()
  return [
    lower.slice(0, 8),
    lower.slice(8, 12),
    lower.slice(12, 16),
    lower.slice(16, 20),
    lower.slice(20),
  ].join('-')
}

export function sameStrings(a: readonly string[], b: readonly string[]) {
  return a.length === b.length && a.every((value, i) => value === b[i])
}

function sameBytes(a: Uint8Array, b: Uint8Array) {
  return a.length === b.length && a.every((value, i) => value === b[i])
}
