import { ObjectLiteral } from 'typeorm'
import { IEntityEventMapBuilder } from '../../event-map-builder'
import {
  ITypeOrmChildProjector,
  ProjectionKey,
  RepositoryFactory,
  TypeOrmContext,
} from './interfaces'
import { TypeOrmEventMapConfigurator } from './eventMapConfigurator'
import { Type } from '../../type'
import { ProjectionState } from './ProjectionState'
import { ProjectionException, ShouldRetry } from '../common'
import { IProjectionCache } from '../../cache/projection-cache'
import { EventCodec } from '../../codec/event-codec'
import { Position, Query, SequencedEvent } from '../../model'

/**
 * Projects sequenced events into a TypeORM entity and records the last
 * projected position in `ProjectionState`, so a batch that was already
 * projected is skipped when it is delivered again.
 *
 * Run `handle` inside a transaction (through `repositoryFactory`) to keep the
 * projection and its checkpoint consistent.
 */
export class TypeOrmProjector<TProjection extends ObjectLiteral, TKey> {
  private readonly mapConfigurator: TypeOrmEventMapConfigurator<
    TProjection,
    TKey
  >
  public shouldRetry: ShouldRetry = () => Promise.resolve(false)

  constructor(
    private readonly Projection: Type<TProjection>,
    private readonly repositoryFactory: RepositoryFactory,
    private readonly codec: EventCodec,
    mapBuilder: IEntityEventMapBuilder<TProjection, TKey, TypeOrmContext>,
    key: ProjectionKey<TProjection, TKey>,
    ...children: ITypeOrmChildProjector[]
  ) {
    this.mapConfigurator = new TypeOrmEventMapConfigurator(
      Projection,
      mapBuilder,
      key,
      children,
    )
  }

  public get id() {
    return this.Projection.name
  }

  public get cache() {
    return this.mapConfigurator.cache
  }

  public set cache(cache: IProjectionCache<TKey, TProjection>) {
    this.mapConfigurator.cache = cache
  }

  /** The events this projector and its children handle, to subscribe with. */
  public query(tags: readonly string[] = []): Query {
    return new Query({
      items: [this.codec.queryItem(this.mapConfigurator.eventTypes, tags)],
    })
  }

  public async handle(events: readonly SequencedEvent[]) {
    if (events.length === 0) return
    const stateRepo = this.repositoryFactory(ProjectionState)
    const lastPosition = await this.getLastPosition()
    const eventsToHandle = events.filter(
      (e) => lastPosition === undefined || e.position > lastPosition,
    )
    if (eventsToHandle.length === 0) return

    await this.executeWithRetry(() => this.projectEventBatch(eventsToHandle))

    await stateRepo.save({
      id: this.id,
      position: eventsToHandle[eventsToHandle.length - 1].position,
      lastUpdateUtc: new Date(),
    })
  }

  public async getLastPosition(): Promise<Position | undefined> {
    const state = await this.repositoryFactory(ProjectionState).findOneBy({
      id: this.id,
    })
    return state?.position
  }

  private async executeWithRetry(action: () => Promise<void>) {
    let i = 1
    while (true) {
      try {
        await action()
        break
      } catch (err) {
        if (!(err instanceof ProjectionException)) throw err
        if (!(await this.shouldRetry(err, i))) {
          throw err
        }
        ++i
      }
    }
  }

  private async projectEventBatch(events: readonly SequencedEvent[]) {
    for (const sequenced of events) {
      try {
        const event = this.codec.decode(sequenced.event)
        if (event === undefined) continue
        await this.mapConfigurator.projectEvent(event, {
          getRepository: this.repositoryFactory,
          position: sequenced.position,
          eventType: sequenced.event.eventType,
          tags: sequenced.event.tags,
          uuid: sequenced.event.uuid,
        })
      } catch (err) {
        const exception = ProjectionException.from(
          err,
          `${this.id} failed to project ${sequenced.event.eventType} at position ${sequenced.position}`,
        )
        exception.currentEvent = sequenced
        exception.eventBatch = events
        throw exception
      }
    }
  }
}
