import { Event, sameStrings } from './event'

export interface QueryItemProps {
  /** Event types to select. Empty selects every type. */
  types?: readonly string[]
  /** Tags that must all be present on an event. */
  tags?: readonly string[]
}

export class QueryItem {
  readonly types: readonly string[]
  readonly tags: readonly string[]

  constructor({ types = [], tags = [] }: QueryItemProps = {}) {
    this.types = Object.freeze([...types])
    this.tags = Object.freeze([...tags])
    Object.freeze(this)
  }

  matches(event: Event): boolean {
    return matchesQueryItem(event, this)
  }

  equals(other: QueryItem): boolean {
    return sameStrings(this.types, other.types) && sameStrings(this.tags, other.tags)
  }

  toString(): string {
    return `QueryItem(types=${JSON.stringify(this.types)}, tags=${JSON.stringify(this.tags)})`
  }
}

/**
 * A disjunction of query items. An event matches when it matches at least
 * one item; a query without items matches every event.
 */
export class Query {
  readonly items: readonly QueryItem[]

  constructor({ items = [] }: { items?: readonly QueryItem[] } = {}) {
    this.items = Object.freeze([...items])
    Object.freeze(this)
  }

  static all(): Query {
    return new Query()
  }

  static of(...items: QueryItemProps[]): Query {
    return new Query({ items: items.map((item) => new QueryItem(item)) })
  }

  get isUniversal(): boolean {
    return this.items.length === 0
  }

  matches(event: Event): boolean {
    return matchesQuery(event, this)
  }

  equals(other: Query): boolean {
    return (
      this.items.length === other.items.length &&
      this.items.every((item, i) => item.equals(other.items[i]))
    )
  }

  toString(): string {
    return `Query(${this.items.map(String).join(', ')})`
  }
}

export function matchesQueryItem(event: Event, item: QueryItem): boolean {
  if (item.types.length > 0 && !item.types.includes(event.eventType)) {
    return false
  }
  return item.tags.every((tag) => event.tags.includes(tag))
}

export function matchesQuery(event: Event, query: Query): boolean {
  return query.items.length === 0 || query.items.some((item) => matchesQueryItem(event, item))
}
