import { Type } from './type'

export interface IEventMap<TContext> {
  /** Event classes that have handlers. */
  readonly eventTypes: readonly Type[]
  handle(event: object, context: TContext): Promise<boolean>
}

export type EventFunc<TContext, TReturn = void, TEvent = object> = (
  event: TEvent,
  context: TContext,
) => TReturn | Promise<TReturn>
export type EventHandler<TContext, TEvent = object> = EventFunc<
  TContext,
  void,
  TEvent
>
export type EventPredicate<TContext, TEvent = object> = EventFunc<
  TContext,
  boolean,
  TEvent
>

export class EventMap<TContext> implements IEventMap<TContext> {
  private readonly mappings = new Map<Function, EventHandler<TContext>[]>()
  private readonly filters: EventPredicate<TContext>[] = []
  private readonly types = new Set<Type>()

  get eventTypes(): readonly Type[] {
    return [...this.types]
  }

  add(Events: Type | readonly Type[], action: EventHandler<TContext>) {
    const types: readonly Type[] = typeof Events === 'function' ? [Events] : Events
    for (const type of types) {
      const handlers = this.mappings.get(type) ?? []
      handlers.push(action)
      this.mappings.set(type, handlers)
      this.types.add(type)
    }
  }

  addFilter(filter: EventPredicate<TContext>) {
    this.filters.push(filter)
  }

  /**
   * Runs every handler mapped to the event's class or one of its base
   * classes, most derived first.
   */
  public async handle(event: object, context: TContext) {
    const handlers = this.handlersFor(event)
    if (handlers.size === 0 || !(await this.passesFilters(event, context))) {
      return false
    }
    for (const handler of handlers) {
      await handler(event, context)
    }
    return true
  }

  private handlersFor(event: object) {
    const handlers = new Set<EventHandler<TContext>>()
    let proto: object | null = Object.getPrototypeOf(event)
    while (proto !== null && proto !== Object.prototype) {
      this.mappings.get(proto.constructor)?.forEach((h) => handlers.add(h))
      proto = Object.getPrototypeOf(proto)
    }
    return handlers
  }

  private async passesFilters(event: object, context: TContext) {
    for (const filter of this.filters) {
      if (!(await filter(event, context))) return false
    }
    return true
  }
}
