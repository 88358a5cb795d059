import { IProjectionCache } from './projection-cache'
import QuickLRU from 'quick-lru'

interface LruOptions {
  capacity: number
  /** Milliseconds an entry stays valid. Entries never expire when absent. */
  retention?: number
}

interface Entry<TProjection> {
  value: TProjection
  storedAt: number
}

export class LruCache<TKey, TProjection>
  implements IProjectionCache<TKey, TProjection> {
  private readonly cache: QuickLRU<TKey, Entry<TProjection>>
  private readonly retention: number

  constructor(options: LruOptions) {
    this.cache = new QuickLRU<TKey, Entry<TProjection>>({
      maxSize: options.capacity,
    })
    this.retention = options.retention ?? Infinity
  }

  add(key: TKey, value: TProjection): void {
    this.cache.set(key, { value, storedAt: Date.now() })
  }

  clear(): void {
    this.cache.clear()
  }

  async get(
    key: TKey,
    create: () => Promise<TProjection | undefined>,
  ): Promise<TProjection | undefined> {
    const entry = this.cache.get(key)
    if (entry !== undefined && Date.now() - entry.storedAt < this.retention) {
      return entry.value
    }
    const value = await create()
    if (value == null) {
      this.cache.delete(key)
      return
    }
    this.add(key, value)
    return value
  }

  remove(key: TKey): void {
    this.cache.delete(key)
  }
}
