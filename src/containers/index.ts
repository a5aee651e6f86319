/**
 * Fixed-capacity containers. None of them grow; running out of room is
 * reported to the caller.
 */

export { SparseSet } from './sparse-set'
export { ResourcePool } from './resource-pool'
export type { PoolHandle, EmplaceResult } from './resource-pool'
export { BoundedTreeMap } from './bounded-tree-map'
export { ImplicitTreeMap } from './implicit-tree-map'
export { defaultCompare } from './ordered-map'
export type {
  BoundedOrderedMap,
  Comparator,
  MapInsertResult
} from './ordered-map'
