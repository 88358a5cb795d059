/** Runs the projection work an event map asks for. */
export interface ProjectorMap<TContext> {
  custom(
    context: TContext,
    project: () => Promise<void> | void,
  ): Promise<void> | void
}

export type ProjectionPredicate<TProjection> = (
  projection: TProjection,
) => boolean
export type ProjectionAction<TProjection> = (
  projection: TProjection,
) => Promise<void> | void

export interface IEntityProjectorMap<TProjection, TKey, TContext>
  extends ProjectorMap<TContext> {
  create(
    key: TKey,
    context: TContext,
    project: ProjectionAction<TProjection>,
    shouldOverwrite: ProjectionPredicate<TProjection>,
  ): Promise<void>

  update(
    key: TKey,
    context: TContext,
    project: ProjectionAction<TProjection>,
    createIfMissing: () => boolean,
  ): Promise<void>

  /** Resolves to false when there was nothing to delete. */
  delete(key: TKey, context: TContext): Promise<boolean>
}

function unsupported(operation: string): never {
  throw new Error(`No handler has been set up for ${operation}`)
}

/**
 * An entity projector map where every operation is unsupported. Subclasses
 * override the operations their projection needs.
 */
export class EntityProjectorMap<TProjection, TKey, TContext>
  implements IEntityProjectorMap<TProjection, TKey, TContext>
{
  async create(
    _key: TKey,
    _context: TContext,
    _project: ProjectionAction<TProjection>,
    _shouldOverwrite: ProjectionPredicate<TProjection>,
  ): Promise<void> {
    unsupported('creations')
  }

  async update(
    _key: TKey,
    _context: TContext,
    _project: ProjectionAction<TProjection>,
    _createIfMissing: () => boolean,
  ): Promise<void> {
    unsupported('updates')
  }

  async delete(_key: TKey, _context: TContext): Promise<boolean> {
    unsupported('deletions')
  }

  custom(
    _context: TContext,
    project: () => Promise<void> | void,
  ): Promise<void> | void {
    return project()
  }
}
