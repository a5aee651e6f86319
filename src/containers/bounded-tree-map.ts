import invariant from 'tiny-invariant'
import {
  defaultCompare,
  type BoundedOrderedMap,
  type Comparator,
  type MapInsertResult
} from './ordered-map'

/**
 * Binary search tree over a fixed pool of node slots.
 *
 * Every slot carries parent/left/right slot indices and a validity flag.
 * Free slots are kept on an array-backed stack; inserts pop a slot and
 * erases push it back. The tree is not rebalanced, so operations are
 * bounded by the tree height, which is at most the slot count.
 */
export class BoundedTreeMap<K, V> implements BoundedOrderedMap<K, V> {
  public readonly capacity: number
  /** Slot index meaning "no node" */
  public readonly end: number

  private readonly compare: Comparator<K>
  private readonly parent: Uint32Array
  private readonly left: Uint32Array
  private readonly right: Uint32Array
  private readonly valid: Uint8Array
  private readonly slots: Array<[K, V] | undefined>
  private readonly freeSlots: Uint32Array
  private freeCount = 0
  private root: number
  private count = 0

  constructor(capacity: number, compare: Comparator<K> = defaultCompare) {
    invariant(
      Number.isInteger(capacity) && capacity > 0,
      'capacity must be a positive integer'
    )

    this.capacity = capacity
    this.end = capacity
    this.compare = compare
    this.parent = new Uint32Array(capacity).fill(capacity)
    this.left = new Uint32Array(capacity).fill(capacity)
    this.right = new Uint32Array(capacity).fill(capacity)
    this.valid = new Uint8Array(capacity)
    this.slots = new Array<[K, V] | undefined>(capacity).fill(undefined)
    this.freeSlots = new Uint32Array(capacity)
    this.root = capacity

    for (let slot = 0; slot < capacity; slot++) {
      this.pushFree(slot)
    }
  }

  get size(): number {
    return this.count
  }

  insert(key: K, value: V): MapInsertResult {
    return this.attach(key, () => value)
  }

  /**
   * Like insert, but only builds the value when a new node is created.
   */
  emplace(key: K, create: () => V): MapInsertResult {
    return this.attach(key, create)
  }

  /**
   * Inserts or overwrites.
   * @returns false if the key was absent and no slot was free
   */
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
    const id = this.findExact(key)
    if (id === this.end) {
      return false
    }

    const hasLeft = this.isLive(this.left[id])
    const hasRight = this.isLive(this.right[id])

    if (hasLeft && hasRight) {
      const successor = this.findMin(this.right[id])
      const successorRight = this.right[successor]

      this.moveNode(successor, id, false, false)

      // Hang the successor's former right subtree where the successor was,
      // using a scratch node to locate that spot.
      if (this.isLive(successorRight)) {
        const detached = this.entryOf(successorRight)
        const scratch = this.attach(detached[0], () => detached[1]).handle
        const scratchParent = this.parent[scratch]

        this.parent[successorRight] = scratchParent
        if (this.left[scratchParent] === scratch) {
          this.left[scratchParent] = successorRight
        } else {
          this.right[scratchParent] = successorRight
        }
        this.pushFree(scratch)
        this.count--
      }
    } else if (hasLeft) {
      this.moveNode(this.left[id], id, true, true)
    } else if (hasRight) {
      this.moveNode(this.right[id], id, true, true)
    } else {
      if (id === this.root) {
        this.root = this.end
      } else {
        const parent = this.parent[id]
        if (this.left[parent] === id) {
          this.left[parent] = this.end
        } else {
          this.right[parent] = this.end
        }
      }
      this.pushFree(id)
    }

    this.count--
    return true
  }

  find(key: K): number {
    return this.findExact(key)
  }

  entryAt(handle: number): [K, V] {
    invariant(this.isLive(handle), `handle ${handle} is not a live node`)
    const [key, value] = this.entryOf(handle)
    return [key, value]
  }

  contains(key: K): boolean {
    return this.findExact(key) !== this.end
  }

  at(key: K): V {
    const id = this.findExact(key)
    invariant(id !== this.end, 'key is not in the map')
    return this.entryOf(id)[1]
  }

  get(key: K): V | undefined {
    const id = this.findExact(key)
    return id === this.end ? undefined : this.entryOf(id)[1]
  }

  clear(): void {
    this.root = this.end
    this.count = 0
    this.freeCount = 0
    for (let slot = 0; slot < this.capacity; slot++) {
      this.pushFree(slot)
    }
  }

  *entries(): IterableIterator<[K, V]> {
    for (let id = this.findMin(this.root); id !== this.end; ) {
      const [key, value] = this.entryOf(id)
      yield [key, value]
      id = this.next(id)
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

  /**
   * Finds the node for `key`, creating it under its nearest node when absent.
   */
  private attach(key: K, create: () => V): MapInsertResult {
    if (!this.isLive(this.root)) {
      if (this.freeCount === 0) {
        return { handle: this.end, inserted: false }
      }
      const id = this.popFree()
      this.slots[id] = [key, create()]
      this.root = id
      this.count++
      return { handle: id, inserted: true }
    }

    const nearest = this.findNearest(key)
    const order = this.compare(key, this.entryOf(nearest)[0])
    if (order === 0) {
      return { handle: nearest, inserted: false }
    }
    if (this.freeCount === 0) {
      return { handle: this.end, inserted: false }
    }

    const id = this.popFree()
    this.slots[id] = [key, create()]
    this.parent[id] = nearest
    if (order < 0) {
      this.left[nearest] = id
    } else {
      this.right[nearest] = id
    }
    this.count++
    return { handle: id, inserted: true }
  }

  /**
   * Puts node `from` in the place of node `to` and frees `to`. Unless told to
   * keep its own subtrees, `from` adopts the children of `to`.
   */
  private moveNode(
    from: number,
    to: number,
    keepLeftSubtree: boolean,
    keepRightSubtree: boolean
  ): void {
    const fromParent = this.parent[from]
    if (this.left[fromParent] === from) {
      this.left[fromParent] = this.end
    } else {
      this.right[fromParent] = this.end
    }

    this.parent[from] = this.parent[to]

    if (!keepLeftSubtree) {
      this.left[from] = this.left[to]
      if (this.isLive(this.left[to])) {
        this.parent[this.left[to]] = from
      }
    }
    if (!keepRightSubtree) {
      this.right[from] = this.right[to]
      if (this.isLive(this.right[to])) {
        this.parent[this.right[to]] = from
      }
    }

    if (to === this.root) {
      this.root = from
    } else {
      const toParent = this.parent[to]
      if (this.left[toParent] === to) {
        this.left[toParent] = from
      } else {
        this.right[toParent] = from
      }
    }

    this.pushFree(to)
  }

  private findExact(key: K): number {
    let current = this.root
    while (this.isLive(current)) {
      const order = this.compare(key, this.entryOf(current)[0])
      if (order === 0) {
        return current
      }
      current = order < 0 ? this.left[current] : this.right[current]
    }
    return this.end
  }

  /**
   * The node holding `key`, or the node that would become its parent.
   * Requires a non-empty tree.
   */
  private findNearest(key: K): number {
    let current = this.root
    for (;;) {
      const order = this.compare(key, this.entryOf(current)[0])
      if (order === 0) {
        return current
      }
      const next = order < 0 ? this.left[current] : this.right[current]
      if (!this.isLive(next)) {
        return current
      }
      current = next
    }
  }

  private findMin(id: number): number {
    if (!this.isLive(id)) {
      return this.end
    }
    let current = id
    while (this.isLive(this.left[current])) {
      current = this.left[current]
    }
    return current
  }

  /**
   * In-order successor of a live node.
   */
  private next(id: number): number {
    if (this.isLive(this.right[id])) {
      return this.findMin(this.right[id])
    }

    let current = id
    for (;;) {
      const parent = this.parent[current]
      if (parent === this.end) {
        return this.end
      }
      if (this.left[parent] === current) {
        return parent
      }
      current = parent
    }
  }

  private isLive(id: number): boolean {
    return id < this.capacity && this.valid[id] === 1
  }

  private entryOf(id: number): [K, V] {
    const entry = this.slots[id]
    invariant(entry, `slot ${id} holds no entry`)
    return entry
  }

  private popFree(): number {
    invariant(this.freeCount > 0, 'no free slots')
    this.freeCount--
    const id = this.freeSlots[this.freeCount]
    this.valid[id] = 1
    return id
  }

  private pushFree(id: number): void {
    invariant(this.freeCount < this.capacity, 'free list overflow')
    this.freeSlots[this.freeCount] = id
    this.freeCount++
    this.valid[id] = 0
    this.parent[id] = this.end
    this.left[id] = this.end
    this.right[id] = this.end
    this.slots[id] = undefined
  }
}
