/** Keeps loaded projections between events of a batch, keyed like the projection. */
export interface IProjectionCache<TKey, TProjection> {
  add(key: TKey, value: TProjection): void

  /** The cached projection, or whatever `load` finds when there is none. */
  get(
    key: TKey,
    load: () => Promise<TProjection | undefined>,
  ): Promise<TProjection | undefined>

  remove(key: TKey): void

  clear(): void
}

/** Caches nothing: every lookup goes to the database. */
export class PassThroughCache<TKey, TProjection>
  implements IProjectionCache<TKey, TProjection> {
  add(): void {}

  clear(): void {}

  remove(): void {}

  get(
    key: TKey,
    load: () => Promise<TProjection | undefined>,
  ): Promise<TProjection | undefined> {
    return load()
  }
}
