import { ValidationError } from '../errors'

export type Position = bigint

export const MAX_POSITION: Position = 2n ** 64n - 1n

export function isPosition(value: bigint): boolean {
  return value >= 0n && value <= MAX_POSITION
}

export function assertPosition(value: bigint, name = 'position'): Position {
  if (!isPosition(value)) {
    throw new ValidationError(
      `${name} must be an unsigned 64-bit integer, got ${value}`,
    )
  }
  return value
}
