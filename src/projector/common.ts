import { Position, SequencedEvent } from '../model'

/** A failure while projecting, with the event and batch it happened in. */
export class ProjectionException extends Error {
  currentEvent?: SequencedEvent
  eventBatch?: readonly SequencedEvent[]
  /** Entity name of the child projector that failed, if one did. */
  childProjector?: string

  constructor(message: string, error?: unknown) {
    super(message, error === undefined ? undefined : { cause: error })
    if (error instanceof Error) {
      this.stack = error.stack
    }
  }

  /** Passes a ProjectionException through and wraps anything else. */
  static from(error: unknown, message: string): ProjectionException {
    return error instanceof ProjectionException
      ? error
      : new ProjectionException(message, error)
  }

  get position(): Position | undefined {
    return this.currentEvent?.position
  }
}

export type ShouldRetry = (
  error: ProjectionException,
  attempts: number,
) => Promise<boolean>
