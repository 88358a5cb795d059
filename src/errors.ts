export class DcbError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause })
    this.name = new.target.name
  }
}

/** An append condition matched an event stored after its `after` position. */
export class IntegrityError extends DcbError {}

/** The store could not be reached, or the call failed in transit. */
export class TransportError extends DcbError {}

/** The store, or a payload it sent, is structurally invalid. */
export class CorruptionError extends DcbError {}

/** Local input/output failed, e.g. a CA certificate could not be read. */
export class IoError extends DcbError {}

/** Caller supplied input was rejected before anything was sent. */
export class ValidationError extends DcbError {}

export function translateError(error: unknown): DcbError {
  if (error instanceof DcbError) return error
  const message = error instanceof Error ? error.message : String(error)
  return new TransportError(message, error)
}
