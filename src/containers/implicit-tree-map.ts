import invariant from 'tiny-invariant'
import {
  defaultCompare,
  type BoundedOrderedMap,
  type Comparator,
  type MapInsertResult
} from './ordered-map'

/**
 * Binary search tree laid out as a complete tree in a flat array: the
 * children of slot `i` are slots `2i + 1` and `2i + 2`. Keys are search
 * pivots, not heap priorities.
 *
 * No pointers are stored. An insert fails once the search path for its key
 * runs past the last level, even if other slots are still empty.
 */
export class ImplicitTreeMap<K, V> implements BoundedOrderedMap<K, V> {
  public readonly height: number
  public readonly capacity: number
  public readonly end: number

  private readonly compare: Comparator<K>
  private readonly valid: Uint8Array
  private readonly slots: Array<[K, V] | undefined>
  /** Slots below this index have children */
  private readonly firstLeaf: number
  private count = 0

  /**
   * @param height - Number of levels below the root; the map has
   * `2^(height+1) - 1` slots
   */
  constructor(height: number, compare: Comparator<K> = defaultCompare) {
    invariant(
      Number.isInteger(height) && height >= 0 && height <= 24,
      'height must be an integer between 0 and 24'
    )

    this.height = height
    this.capacity = 2 ** (height + 1) - 1
    this.end = this.capacity
    this.firstLeaf = 2 ** height - 1
    this.compare = compare
    this.valid = new Uint8Array(this.capacity)
    this.slots = new Array<[K, V] | undefined>(this.capacity).fill(undefined)
  }

  get size(): number {
    return this.count
  }

  insert(key: K, value: V): MapInsertResult {
    return this.attach(key, () => value)
  }

  emplace(key: K, create: () => V): MapInsertResult {
    return this.attach(key, create)
  }

  set(key: K, value: V): boolean {
    const result = this.attach(key, () => value)
    if (result.handle === this.end) {
      return false
    }
    if (!result.inserted) {
      this.slots[result.handle] = [key, value]
    }
    return true
  }

  erase(key: K): boolean {
    const slot = this.findSlot(key)
    if (slot === this.end) {
      return false
    }

    if (slot >= this.firstLeaf) {
      this.release(slot)
    } else {
      const leftChild = 2 * slot + 1
      const rightChild = 2 * slot + 2
      const hasLeft = this.isLive(leftChild)
      const hasRight = this.isLive(rightChild)

      if (hasLeft && hasRight) {
        const successor = this.findMin(rightChild)
        this.slots[slot] = this.entryOf(successor)
        this.release(successor)

        // The successor has no left child; lift its right subtree into place.
        const successorRight = 2 * successor + 2
        if (this.isLive(successorRight)) {
          this.shiftSubtree(successorRight, successor)
        }
      } else if (hasLeft) {
        this.shiftSubtree(leftChild, slot)
      } else if (hasRight) {
        this.shiftSubtree(rightChild, slot)
      } else {
        this.release(slot)
      }
    }

    this.count--
    return true
  }

  find(key: K): number {
    return this.findSlot(key)
  }

  entryAt(handle: number): [K, V] {
    invariant(this.isLive(handle), `handle ${handle} is not a live slot`)
    const [key, value] = this.entryOf(handle)
    return [key, value]
  }

  contains(key: K): boolean {
    return this.findSlot(key) !== this.end
  }

  at(key: K): V {
    const slot = this.findSlot(key)
    invariant(slot !== this.end, 'key is not in the map')
    return this.entryOf(slot)[1]
  }

  get(key: K): V | undefined {
    const slot = this.findSlot(key)
    return slot === this.end ? undefined : this.entryOf(slot)[1]
  }

  clear(): void {
    this.valid.fill(0)
    this.slots.fill(undefined)
    this.count = 0
  }

  *entries(): IterableIterator<[K, V]> {
    for (let slot = this.findMin(0); slot !== this.end; ) {
      const [key, value] = this.entryOf(slot)
      yield [key, value]
      slot = this.next(slot)
    }
  }

  *keys(): IterableIterator<K> {
    for (const [key] of this.entries()) {
      yield key
    }
  }

  *values(): IterableIterator<V> {
    for (const [, value] of this.entries()) {
      yield value
    }
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.entries()
  }

  private attach(key: K, create: () => V): MapInsertResult {
    let slot = 0
    while (slot < this.capacity && this.isLive(slot)) {
      const order = this.compare(key, this.entryOf(slot)[0])
      if (order === 0) {
        return { handle: slot, inserted: false }
      }
      slot = order < 0 ? 2 * slot + 1 : 2 * slot + 2
    }

    if (slot >= this.capacity) {
      return { handle: this.end, inserted: false }
    }

    this.valid[slot] = 1
    this.slots[slot] = [key, create()]
    this.count++
    return { handle: slot, inserted: true }
  }

  private findSlot(key: K): number {
    let slot = 0
    while (this.isLive(slot)) {
      const order = this.compare(key, this.entryOf(slot)[0])
      if (order === 0) {
        return slot
      }
      slot = order < 0 ? 2 * slot + 1 : 2 * slot + 2
    }
    return this.end
  }

  /**
   * Moves the subtree rooted at `from` so that it is rooted at `to`, one
   * level at a time from the top. `to` must be an ancestor of `from` whose
   * other subtree is empty.
   */
  private shiftSubtree(from: number, to: number): void {
    const depth = 31 - Math.clz32(from + 1)
    const levels = this.height - depth + 1
    let sourceStart = from
    let targetStart = to

    for (let level = 0; level < levels; level++) {
      const width = 2 ** level
      for (let offset = 0; offset < width; offset++) {
        const source = sourceStart + offset
        const target = targetStart + offset

        if (this.isLive(source)) {
          this.valid[target] = 1
          this.slots[target] = this.slots[source]
          this.release(source)
        } else {
          this.release(target)
        }
      }

      sourceStart = 2 * sourceStart + 1
      targetStart = 2 * targetStart + 1
    }
  }

  private findMin(slot: number): number {
    if (!this.isLive(slot)) {
      return this.end
    }
    let current = slot
    while (this.isLive(2 * current + 1)) {
      current = 2 * current + 1
    }
    return current
  }

  private next(slot: number): number {
    const rightChild = 2 * slot + 2
    if (this.isLive(rightChild)) {
      return this.findMin(rightChild)
    }

    let current = slot
    while (current !== 0) {
      const parent = (current - 1) >> 1
      if (2 * parent + 1 === current) {
        return parent
      }
      current = parent
    }
    return this.end
  }

  private isLive(slot: number): boolean {
    return slot < this.capacity && this.valid[slot] === 1
  }

  private entryOf(slot: number): [K, V] {
    const entry = this.slots[slot]
    invariant(entry, `slot ${slot} holds no entry`)
    return entry
  }

  private release(slot: number): void {
    this.valid[slot] = 0
    this.slots[slot] = undefined
  }
}
