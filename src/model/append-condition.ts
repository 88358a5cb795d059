import { Query } from './query'
import { SequencedEvent } from './sequenced-event'
import { assertPosition, Position } from './position'

export interface AppendConditionProps {
  failIfEventsMatch: Query
  /** Only events strictly after this position count. Absent means the whole log. */
  after?: Position
}

/**
 * Optimistic concurrency guard for an append: the append is rejected when any
 * stored event after `after` matches `failIfEventsMatch`.
 */
export class AppendCondition {
  readonly failIfEventsMatch: Query
  readonly after: Position | undefined

  constructor({ failIfEventsMatch, after }: AppendConditionProps) {
    this.failIfEventsMatch = failIfEventsMatch
    this.after = after === undefined ? undefined : assertPosition(after, 'after')
    Object.freeze(this)
  }

  appliesTo(event: SequencedEvent): boolean {
    if (this.after !== undefined && event.position <= this.after) return false
    return this.failIfEventsMatch.matches(event.event)
  }

  isViolatedBy(events: Iterable<SequencedEvent>): boolean {
    for (const event of events) {
      if (this.appliesTo(event)) return true
    }
    return false
  }

  toString(): string {
    return `AppendCondition(failIfEventsMatch=${this.failIfEventsMatch}, after=${this.after ?? 'none'})`
  }
}
