import { ObjectLiteral } from 'typeorm'
import { IEntityEventMapBuilder } from '../../event-map-builder'
import { IEventMap } from '../../event-map'
import {
  IEntityProjectorMap,
  ProjectionAction,
  ProjectionPredicate,
} from '../../projector-map'
import { ITypeOrmChildProjector, ProjectionKey, TypeOrmContext } from './interfaces'
import { Type } from '../../type'
import { IProjectionCache, PassThroughCache } from '../../cache/projection-cache'

export class TypeOrmEventMapConfigurator<TProjection extends ObjectLiteral, TKey>
  implements IEntityProjectorMap<TProjection, TKey, TypeOrmContext> {
  private readonly map: IEventMap<TypeOrmContext>
  private _cache: IProjectionCache<TKey, TProjection> = new PassThroughCache()

  constructor(
    private readonly Projection: Type<TProjection>,
    mapBuilder: IEntityEventMapBuilder<TProjection, TKey, TypeOrmContext>,
    private readonly key: ProjectionKey<TProjection, TKey>,
    private readonly childProjectors: readonly ITypeOrmChildProjector[],
  ) {
    this.map = mapBuilder.build(this)
  }

  public get cache() {
    return this._cache
  }

  public set cache(cache: IProjectionCache<TKey, TProjection>) {
    this._cache = cache
  }

  /** Event classes handled here or by any child projector. */
  public get eventTypes(): readonly Type[] {
    const types = new Set(this.map.eventTypes)
    for (const child of this.childProjectors) {
      child.eventTypes.forEach((type) => types.add(type))
    }
    return [...types]
  }

  async custom(context: TypeOrmContext, projector: () => Promise<void> | void) {
    await projector()
  }

  async create(
    key: TKey,
    context: TypeOrmContext,
    projector: ProjectionAction<TProjection>,
    shouldOverwrite: ProjectionPredicate<TProjection>,
  ) {
    const existing = await this.load(key, context)
    if (existing !== undefined && !shouldOverwrite(existing)) return
    await this.store(key, context, existing ?? this.blank(key, context), projector)
  }

  async update(
    key: TKey,
    context: TypeOrmContext,
    projector: ProjectionAction<TProjection>,
    createIfMissing: () => boolean,
  ): Promise<void> {
    const existing = await this.load(key, context)
    if (existing === undefined && !createIfMissing()) return
    await this.store(key, context, existing ?? this.blank(key, context), projector)
  }

  async delete(key: TKey, context: TypeOrmContext) {
    const repo = context.getRepository(this.Projection)
    const results = await repo.delete(this.key.where(key))
    this.cache.remove(key)
    return (results.affected ?? 0) > 0
  }

  async projectEvent(event: object, context: TypeOrmContext) {
    for (const projector of this.childProjectors) {
      await projector.projectEvent(event, context)
    }
    await this.map.handle(event, context)
  }

  private load(key: TKey, context: TypeOrmContext) {
    return this.cache.get(key, async () => {
      const projection = await context
        .getRepository(this.Projection)
        .findOneBy(this.key.where(key))
      return projection ?? undefined
    })
  }

  private blank(key: TKey, context: TypeOrmContext) {
    const projection = context.getRepository(this.Projection).create()
    this.key.set(projection, key)
    return projection
  }

  private async store(
    key: TKey,
    context: TypeOrmContext,
    projection: TProjection,
    projector: ProjectionAction<TProjection>,
  ) {
    await projector(projection)
    await context.getRepository(this.Projection).save(projection)
    this.cache.add(key, projection)
  }
}
