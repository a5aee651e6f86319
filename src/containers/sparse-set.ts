import invariant from 'tiny-invariant'

/**
 * Bounded set of small non-negative integers with O(1) insert, erase and
 * membership.
 *
 * Members are packed into a dense array; the sparse array maps a key to its
 * position in the dense array and is only meaningful while the key is a
 * member. Erasing swaps the last member into the freed position, so
 * iteration order is unspecified.
 *
 * Iteration walks the dense array from the back. Erasing the key currently
 * being visited therefore never skips a remaining key; keys inserted while
 * iterating are not visited.
 */
export class SparseSet implements Iterable<number> {
  public readonly sparseCapacity: number
  public readonly capacity: number

  private readonly dense: Uint32Array
  private readonly sparse: Uint32Array
  private denseSize = 0

  /**
   * @param sparseCapacity - Keys must lie in `[0, sparseCapacity)`
   * @param denseCapacity - Maximum number of members (defaults to `sparseCapacity`)
   */
  constructor(sparseCapacity: number, denseCapacity: number = sparseCapacity) {
    invariant(
      Number.isInteger(sparseCapacity) && sparseCapacity > 0,
      'sparseCapacity must be a positive integer'
    )
    invariant(
      Number.isInteger(denseCapacity) && denseCapacity > 0,
      'denseCapacity must be a positive integer'
    )
    invariant(
      denseCapacity <= sparseCapacity,
      'denseCapacity must not exceed sparseCapacity'
    )

    this.sparseCapacity = sparseCapacity
    this.capacity = denseCapacity
    this.dense = new Uint32Array(denseCapacity)
    this.sparse = new Uint32Array(sparseCapacity)
  }

  get size(): number {
    return this.denseSize
  }

  isEmpty(): boolean {
    return this.denseSize === 0
  }

  isFull(): boolean {
    return this.denseSize === this.capacity
  }

  contains(key: number): boolean {
    if (!this.inRange(key)) {
      return false
    }
    const position = this.sparse[key]
    return position < this.denseSize && this.dense[position] === key
  }

  /**
   * Adds a key.
   * @returns true if the key was added, false if it was already present,
   * out of range, or the set is full
   */
  insert(key: number): boolean {
    if (!this.inRange(key) || this.contains(key)) {
      return false
    }
    if (this.denseSize === this.capacity) {
      return false
    }

    this.sparse[key] = this.denseSize
    this.dense[this.denseSize] = key
    this.denseSize++
    return true
  }

  /**
   * Removes a key by moving the last member into its position.
   * @returns true if the key was a member
   */
  erase(key: number): boolean {
    if (!this.contains(key)) {
      return false
    }

    const position = this.sparse[key]
    const last = this.dense[this.denseSize - 1]
    this.dense[position] = last
    this.sparse[last] = position
    this.denseSize--
    return true
  }

  /**
   * Position of a member in the dense array.
   */
  indexOf(key: number): number {
    invariant(this.contains(key), `key ${key} is not in the set`)
    return this.sparse[key]
  }

  keyAt(position: number): number {
    invariant(
      Number.isInteger(position) && position >= 0 && position < this.denseSize,
      `position ${position} is out of bounds`
    )
    return this.dense[position]
  }

  clear(): void {
    this.denseSize = 0
  }

  *keys(): IterableIterator<number> {
    for (
      let position = this.denseSize - 1;
      position >= 0;
      position = Math.min(position, this.denseSize) - 1
    ) {
      yield this.dense[position]
    }
  }

  [Symbol.iterator](): IterableIterator<number> {
    return this.keys()
  }

  private inRange(key: number): boolean {
    return Number.isInteger(key) && key >= 0 && key < this.sparseCapacity
  }
}
