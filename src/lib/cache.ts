export interface TtlCacheOptions<T> {
  ttlMs: number
  // A loaded value that is "empty" is returned but not kept, so the next call retries
  isEmpty?: (value: T) => boolean
  now?: () => number
}

/**
 * Single-value cache with a time-to-live. Owned by whoever constructs it;
 * nothing here is process-global.
 */
export class TtlCache<T> {
  private value: T | undefined
  private storedAt = 0
  private pending: Promise<T> | null = null
  // Bumped by invalidate() so a load started earlier doesn't store its result
  private generation = 0
  private readonly ttlMs: number
  private readonly isEmpty: (value: T) => boolean
  private readonly now: () => number

  constructor(options: TtlCacheOptions<T>) {
    this.ttlMs = options.ttlMs
    this.isEmpty = options.isEmpty ?? (() => false)
    this.now = options.now ?? Date.now
  }

  get(): T | undefined {
    if (this.value === undefined) return undefined
    if (this.now() - this.storedAt >= this.ttlMs) {
      this.value = undefined
      return undefined
    }
    return this.value
  }

  set(value: T): void {
    if (this.isEmpty(value)) return
    this.value = value
    this.storedAt = this.now()
  }

  invalidate(): void {
    this.value = undefined
    this.storedAt = 0
    this.generation++
    this.pending = null
  }

  /** Concurrent callers during a load share one loader call. */
  async getOrLoad(loader: () => Promise<T>): Promise<T> {
    const cached = this.get()
    if (cached !== undefined) return cached
    if (this.pending) return this.pending

    const generation = this.generation
    const pending = loader()
    this.pending = pending
    try {
      const value = await pending
      if (generation === this.generation) this.set(value)
      return value
    } finally {
      if (this.pending === pending) this.pending = null
    }
  }
}
