import { FindOptionsWhere, ObjectLiteral, Repository } from 'typeorm'
import { Position } from '../../model'
import { Type } from '../../type'

export type RepositoryFactory = <T extends ObjectLiteral>(Entity: Type<T>) => Repository<T>

export interface TypeOrmContext {
  getRepository: RepositoryFactory
  position: Position
  eventType: string
  tags: readonly string[]
  uuid?: string
}

/** How a projection is identified by its key. */
export interface ProjectionKey<TProjection, TKey> {
  set(projection: TProjection, key: TKey): void
  where(key: TKey): FindOptionsWhere<TProjection>
}

export interface ITypeOrmChildProjector {
  readonly eventTypes: readonly Type[]
  projectEvent(event: object, context: TypeOrmContext): Promise<void>
}
