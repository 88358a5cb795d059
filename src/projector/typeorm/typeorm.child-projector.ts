import { ObjectLiteral } from 'typeorm'
import { ITypeOrmChildProjector, ProjectionKey, TypeOrmContext } from './interfaces'
import { TypeOrmEventMapConfigurator } from './eventMapConfigurator'
import { IEntityEventMapBuilder } from '../../event-map-builder'
import { Type } from '../../type'
import { ProjectionException } from '../common'

/**
 * Projects the same events as its parent into a dependent entity. Runs before
 * the parent within the parent's batch and transaction.
 */
export class TypeOrmChildProjector<TProjection extends ObjectLiteral, TKey>
  implements ITypeOrmChildProjector {
  private readonly mapConfigurator: TypeOrmEventMapConfigurator<
    TProjection,
    TKey
  >

  constructor(
    private readonly Projection: Type<TProjection>,
    mapBuilder: IEntityEventMapBuilder<TProjection, TKey, TypeOrmContext>,
    key: ProjectionKey<TProjection, TKey>,
    ...children: ITypeOrmChildProjector[]
  ) {
    this.mapConfigurator = new TypeOrmEventMapConfigurator<TProjection, TKey>(
      Projection,
      mapBuilder,
      key,
      children,
    )
  }

  get eventTypes() {
    return this.mapConfigurator.eventTypes
  }

  async projectEvent(event: object, context: TypeOrmContext): Promise<void> {
    try {
      await this.mapConfigurator.projectEvent(event, context)
    } catch (err) {
      const exception = ProjectionException.from(
        err,
        `Child projector ${this.Projection.name} failed`,
      )
      exception.childProjector ??= this.Projection.name
      throw exception
    }
  }
}
