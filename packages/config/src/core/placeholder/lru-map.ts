/**
 * Map bounded to `capacity` entries; the least recently used entry is evicted first.
 */
export class LruMap<K, V> {
  private readonly map = new Map<K, V>()

  constructor(private readonly capacity: number) {}

  get(key: K): V | undefined {
    const value = this.map.get(key)

    if (value === undefined) return undefined

    this.markMostRecentlyUsed(key, value)

    return value
  }

  set(key: K, value: V): void {
    if (this.map.has(key)) this.map.delete(key)

    this.map.set(key, value)

    while (this.map.size > this.capacity) {
      const victim = this.map.keys().next()
      if (victim.done) break
      this.map.delete(victim.value)
    }
  }

  has(key: K): boolean {
    return this.map.has(key)
  }

  size(): number {
    return this.map.size
  }

  private markMostRecentlyUsed(key: K, value: V): void {
    this.map.delete(key)
    this.map.set(key, value)
  }
}
