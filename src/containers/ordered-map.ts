/**
 * Returns a negative number when `a` orders before `b`, a positive number
 * when after, and 0 when the keys are equal.
 */
export type Comparator<K> = (a: K, b: K) => number

export function defaultCompare<K>(a: K, b: K): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export interface MapInsertResult {
  /** Slot of the entry, or the map's `end` when nothing could be stored */
  handle: number
  inserted: boolean
}

/**
 * Key-ordered map with a fixed number of slots. Running out of room is
 * reported through `end` handles instead of growing.
 */
export interface BoundedOrderedMap<K, V> extends Iterable<[K, V]> {
  readonly size: number
  readonly capacity: number
  readonly end: number

  insert(key: K, value: V): MapInsertResult
  emplace(key: K, create: () => V): MapInsertResult
  erase(key: K): boolean
  find(key: K): number
  entryAt(handle: number): [K, V]
  contains(key: K): boolean
  at(key: K): V
  get(key: K): V | undefined
  set(key: K, value: V): boolean
  clear(): void
  entries(): IterableIterator<[K, V]>
  keys(): IterableIterator<K>
  values(): IterableIterator<V>
}
