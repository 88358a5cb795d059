import { ServiceError, status } from '@grpc/grpc-js'
import {
  CorruptionError,
  DcbError,
  IntegrityError,
  TransportError,
  ValidationError,
  translateError,
} from '../../errors'

export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof Error && 'code' in error && typeof error.code === 'number'
}

export function mapGrpcError(error: unknown): DcbError {
  if (error instanceof DcbError || !isServiceError(error)) {
    return translateError(error)
  }
  const details = error.details || error.message
  switch (error.code) {
    case status.FAILED_PRECONDITION:
    case status.ALREADY_EXISTS:
      return new IntegrityError(details, error)
    case status.DATA_LOSS:
      return new CorruptionError(details, error)
    case status.INVALID_ARGUMENT:
      return new ValidationError(details, error)
    default:
      return new TransportError(`${status[error.code] ?? error.code}: ${details}`, error)
  }
}
