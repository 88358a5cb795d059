import { EventHandler, EventMap, EventPredicate, IEventMap } from './event-map'
import { isInstanceOfAny, Type } from './type'
import { IEntityProjectorMap, ProjectorMap } from './projector-map'

export interface IEventMapBuilder<TContext> {
  build(projector: ProjectorMap<TContext>): IEventMap<TContext>
}

export interface IEntityEventMapBuilder<TProjection, TKey, TContext> {
  build(
    projector: IEntityProjectorMap<TProjection, TKey, TContext>,
  ): IEventMap<TContext>
}

/** Derives the key of the projection an event affects. */
export type KeySelector<TEvent, TContext, TKey> = (
  event: TEvent,
  context: TContext,
) => TKey

export type ProjectionUpdate<TProjection, TEvent, TContext> = (
  projection: TProjection,
  event: TEvent,
  context: TContext,
) => Promise<void> | void

type DuplicatePolicy<TProjection, TEvent, TContext> = (
  existing: TProjection,
  event: TEvent,
  context: TContext,
) => boolean

type EntityProjector<TProjection, TKey, TContext> = () => IEntityProjectorMap<
  TProjection,
  TKey,
  TContext
>

function notBuilt(): never {
  throw new Error('The event map has not been built yet')
}

/**
 * Takes the projection key from the event's `<prefix>:<key>` tag, e.g.
 * `keyFromTag('product')` reads `42` from `product:42`.
 */
export function keyFromTag(
  prefix: string,
): KeySelector<object, { tags: readonly string[] }, string> {
  const marker = `${prefix}:`
  return (_event, { tags }) => {
    const tag = tags.find((t) => t.startsWith(marker))
    if (tag === undefined) {
      throw new Error(`Event has no ${marker} tag`)
    }
    return tag.slice(marker.length)
  }
}

export class EventMapBuilder<TContext> implements IEventMapBuilder<TContext> {
  private readonly eventMap = new EventMap<TContext>()
  private projector?: ProjectorMap<TContext>

  public where(filter: EventPredicate<TContext>) {
    this.eventMap.addFilter(filter)
    return this
  }

  public map<TEvent extends object>(
    ...Events: Type<TEvent>[]
  ): EventAction<TEvent, TContext> {
    return new EventAction(
      Events,
      (handler) => this.eventMap.add(Events, handler),
      () => this.projector ?? notBuilt(),
    )
  }

  public build(projector: ProjectorMap<TContext>): IEventMap<TContext> {
    this.projector = projector
    return this.eventMap
  }
}

/** A handler for some event classes, guarded by `when` conditions. */
export class EventAction<TEvent extends object, TContext> {
  private readonly conditions: EventPredicate<TContext, TEvent>[] = []

  constructor(
    private readonly Events: readonly Type<TEvent>[],
    private readonly register: (handler: EventHandler<TContext>) => void,
    private readonly projector: () => ProjectorMap<TContext>,
  ) {}

  when(condition: EventPredicate<TContext, TEvent>): this {
    this.conditions.push(condition)
    return this
  }

  as(handler: EventHandler<TContext, TEvent>): void {
    this.register(async (event, context) => {
      // Narrows to TEvent; the map only dispatches instances of these classes.
      if (!isInstanceOfAny(event, this.Events)) return
      const matched: TEvent = event
      if (!(await this.accepts(matched, context))) return
      await this.projector().custom(context, () => handler(matched, context))
    })
  }

  private async accepts(event: TEvent, context: TContext) {
    for (const condition of this.conditions) {
      if (!(await condition(event, context))) return false
    }
    return true
  }
}

export class EntityEventMapBuilder<TProjection, TKey, TContext>
  implements IEntityEventMapBuilder<TProjection, TKey, TContext>
{
  private readonly events = new EventMapBuilder<TContext>()
  private projector?: IEntityProjectorMap<TProjection, TKey, TContext>

  public where(predicate: EventPredicate<TContext>): this {
    this.events.where(predicate)
    return this
  }

  public map<TEvent extends object>(
    Event: Type<TEvent>,
  ): EntityAction<TProjection, TKey, TEvent, TContext> {
    return new EntityAction(
      this.events.map(Event),
      () => this.projector ?? notBuilt(),
    )
  }

  public build(
    projector: IEntityProjectorMap<TProjection, TKey, TContext>,
  ): IEventMap<TContext> {
    this.projector = projector
    return this.events.build({ custom: (_context, project) => project() })
  }
}

export class EntityAction<TProjection, TKey, TEvent extends object, TContext> {
  constructor(
    private readonly action: EventAction<TEvent, TContext>,
    private readonly projector: EntityProjector<TProjection, TKey, TContext>,
  ) {}

  when(condition: EventPredicate<TContext, TEvent>): this {
    this.action.when(condition)
    return this
  }

  asCreateOf(selectKey: KeySelector<TEvent, TContext, TKey>) {
    return new CreateAction(this.action, this.projector, selectKey)
  }

  asUpdateOf(selectKey: KeySelector<TEvent, TContext, TKey>) {
    return new UpdateAction(this.action, this.projector, selectKey)
  }

  asDeleteOf(selectKey: KeySelector<TEvent, TContext, TKey>) {
    return new DeleteAction(this.action, this.projector, selectKey)
  }

  as(handler: EventHandler<TContext, TEvent>): void {
    this.action.as(handler)
  }
}

export class CreateAction<TProjection, TKey, TEvent extends object, TContext> {
  private onDuplicate: DuplicatePolicy<TProjection, TEvent, TContext> = (
    _existing,
    event,
    context,
  ) => {
    throw new Error(
      `Projection with key ${this.selectKey(event, context)} already exists`,
    )
  }

  constructor(
    private readonly action: EventAction<TEvent, TContext>,
    private readonly projector: EntityProjector<TProjection, TKey, TContext>,
    private readonly selectKey: KeySelector<TEvent, TContext, TKey>,
  ) {}

  using(update: ProjectionUpdate<TProjection, TEvent, TContext>): this {
    this.action.as((event, context) =>
      this.projector().create(
        this.selectKey(event, context),
        context,
        (projection) => update(projection, event, context),
        (existing) => this.onDuplicate(existing, event, context),
      ),
    )
    return this
  }

  ignoringDuplicates(): this {
    return this.handlingDuplicatesUsing(() => false)
  }

  overwritingDuplicates(): this {
    return this.handlingDuplicatesUsing(() => true)
  }

  /** `policy` returns true to overwrite the existing projection. */
  handlingDuplicatesUsing(
    policy: DuplicatePolicy<TProjection, TEvent, TContext>,
  ): this {
    this.onDuplicate = policy
    return this
  }
}

export class UpdateAction<TProjection, TKey, TEvent extends object, TContext> {
  private onMissing: (key: TKey, context: TContext) => boolean = (key) => {
    throw new Error(`Failed to find projection with key ${key}`)
  }

  constructor(
    private readonly action: EventAction<TEvent, TContext>,
    private readonly projector: EntityProjector<TProjection, TKey, TContext>,
    private readonly selectKey: KeySelector<TEvent, TContext, TKey>,
  ) {}

  using(update: ProjectionUpdate<TProjection, TEvent, TContext>): this {
    this.action.as((event, context) => {
      const key = this.selectKey(event, context)
      return this.projector().update(
        key,
        context,
        (projection) => update(projection, event, context),
        () => this.onMissing(key, context),
      )
    })
    return this
  }

  ignoringMisses(): this {
    return this.handlingMissesUsing(() => false)
  }

  creatingIfMissing(): this {
    return this.handlingMissesUsing(() => true)
  }

  /** `policy` returns true to create the missing projection. */
  handlingMissesUsing(policy: (key: TKey, context: TContext) => boolean): this {
    this.onMissing = policy
    return this
  }
}

export class DeleteAction<TProjection, TKey, TEvent extends object, TContext> {
  private onMissing: (key: TKey, context: TContext) => Promise<void> | void = (
    key,
  ) => {
    throw new Error(
      `Failed to delete projection with key ${key} because it does not exist`,
    )
  }

  constructor(
    action: EventAction<TEvent, TContext>,
    projector: EntityProjector<TProjection, TKey, TContext>,
    selectKey: KeySelector<TEvent, TContext, TKey>,
  ) {
    action.as(async (event, context) => {
      const key = selectKey(event, context)
      if (!(await projector().delete(key, context))) {
        await this.onMissing(key, context)
      }
    })
  }

  ignoringMisses(): this {
    return this.handlingMissesUsing(() => undefined)
  }

  handlingMissesUsing(
    policy: (key: TKey, context: TContext) => Promise<void> | void,
  ): this {
    this.onMissing = policy
    return this
  }
}
