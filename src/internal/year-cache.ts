/**
 * Year Cache
 *
 * Capped map from year number to a computed per-year value. When full, the
 * oldest inserted year is evicted. Capacity 0 disables storage; every lookup
 * then recomputes.
 */

export type CacheStats = {
  hits: number
  misses: number
  size: number
  capacity: number
}

export type YearCache<V extends object> = {
  get(year: number, compute: (year: number) => V): V
  stats(): CacheStats
}

export function createYearCache<V extends object>(capacity: number): YearCache<V> {
  const entries = new Map<number, V>()
  let hits = 0
  let misses = 0

  function get(year: number, compute: (year: number) => V): V {
    const cached = entries.get(year)
    if (cached !== undefined) {
      hits++
      return cached
    }
    misses++
    const value = compute(year)
    if (capacity > 0) {
      if (entries.size >= capacity) {
        const oldest = entries.keys().next()
        if (!oldest.done) entries.delete(oldest.value)
      }
      entries.set(year, value)
    }
    return value
  }

  return {
    get,
    stats() {
      return { hits, misses, size: entries.size, capacity }
    },
  }
}
