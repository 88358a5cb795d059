import { ClassConstructor } from 'class-transformer'

export type Type<T = object> = ClassConstructor<T>

export function isInstanceOfAny<T>(
  value: unknown,
  Types: readonly Type<T>[],
): value is T {
  return Types.some((Type) => value instanceof Type)
}
