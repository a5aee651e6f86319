import invariant from 'tiny-invariant'
import { SparseSet } from './sparse-set'

/**
 * Position of a value inside a pool. Only valid until the next erase.
 */
export type PoolHandle = number

export interface EmplaceResult {
  handle: PoolHandle
  inserted: boolean
}

/**
 * Fixed-capacity map from small integer keys to preallocated value slots.
 *
 * A SparseSet tracks membership and the dense value array is kept in
 * lock-step with it: the value for the key at dense position `i` lives in
 * slot `i`. Value slots are created once by the factory and reused; erasing
 * swaps slot objects rather than reallocating them.
 */
export class ResourcePool<V> {
  static readonly end: PoolHandle = -1

  private readonly keySet: SparseSet
  private readonly slots: V[]

  /**
   * @param keyCapacity - Keys must lie in `[0, keyCapacity)`
   * @param capacity - Maximum number of held values
   * @param createSlot - Builds the preallocated value for one slot
   */
  constructor(keyCapacity: number, capacity: number, createSlot: () => V) {
    this.keySet = new SparseSet(keyCapacity, capacity)
    this.slots = Array.from({ length: capacity }, createSlot)
  }

  get size(): number {
    return this.keySet.size
  }

  get capacity(): number {
    return this.keySet.capacity
  }

  isEmpty(): boolean {
    return this.keySet.isEmpty()
  }

  isFull(): boolean {
    return this.keySet.isFull()
  }

  contains(key: number): boolean {
    return this.keySet.contains(key)
  }

  /**
   * Stores a value for a key that is not yet present by letting `fill`
   * write into the key's preallocated slot. The pool never holds on to a
   * caller's object. An existing entry is left untouched and its handle
   * returned.
   */
  emplace(key: number, fill: (slot: V) => void): EmplaceResult {
    const result = this.emplaceEmpty(key)
    if (result.inserted) {
      fill(this.slots[result.handle])
    }
    return result
  }

  /**
   * Claims the slot for a key without writing to it. The slot still holds
   * whatever the previous occupant left behind.
   */
  emplaceEmpty(key: number): EmplaceResult {
    if (this.keySet.contains(key)) {
      return { handle: this.keySet.indexOf(key), inserted: false }
    }
    if (!this.keySet.insert(key)) {
      return { handle: ResourcePool.end, inserted: false }
    }
    return { handle: this.keySet.size - 1, inserted: true }
  }

  erase(key: number): boolean {
    if (!this.keySet.contains(key)) {
      return false
    }

    const position = this.keySet.indexOf(key)
    const lastPosition = this.keySet.size - 1
    const freed = this.slots[position]
    this.slots[position] = this.slots[lastPosition]
    this.slots[lastPosition] = freed

    return this.keySet.erase(key)
  }

  at(key: number): V {
    invariant(this.keySet.contains(key), `key ${key} is not in the pool`)
    return this.slots[this.keySet.indexOf(key)]
  }

  get(key: number): V | undefined {
    if (!this.keySet.contains(key)) {
      return undefined
    }
    return this.slots[this.keySet.indexOf(key)]
  }

  valueAt(handle: PoolHandle): V {
    invariant(
      Number.isInteger(handle) && handle >= 0 && handle < this.keySet.size,
      `handle ${handle} does not refer to a held value`
    )
    return this.slots[handle]
  }

  keyAt(handle: PoolHandle): number {
    return this.keySet.keyAt(handle)
  }

  /**
   * Read-only view of the held keys.
   */
  handles(): Iterable<number> {
    return this.keySet
  }

  *entries(): IterableIterator<[number, V]> {
    for (const key of this.keySet) {
      yield [key, this.slots[this.keySet.indexOf(key)]]
    }
  }

  clear(): void {
    this.keySet.clear()
  }
}
