import { Event } from './event'
import { assertPosition, Position } from './position'

/**
 * An event together with the position the store assigned to it.
 * Only values read back from the store should be wrapped in one.
 */
export class SequencedEvent {
  readonly position: Position

  constructor(
    readonly event: Event,
    position: Position,
  ) {
    this.position = assertPosition(position)
    Object.freeze(this)
  }

  equals(other: SequencedEvent): boolean {
    return this.position === other.position && this.event.equals(other.event)
  }

  toString(): string {
    return `SequencedEvent(position=${this.position}, event=${this.event})`
  }
}
