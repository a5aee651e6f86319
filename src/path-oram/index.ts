export { PathOram } from './path-oram'
export type { OramClientState } from './path-oram'
export { OramStore, storeExists, storePaths } from './oram-store'
export type { OramStorePaths } from './oram-store'
export { ServerMemory } from './server-memory'
export { PositionMap } from './position-map'
export {
  Xorshift64Sampler,
  CryptoPathSampler,
  createSampler
} from './path-sampler'
export { resolveGeometry, defaultStashCapacity } from './geometry'
export type { GeometryOptions, ResolvedGeometry } from './geometry'
export {
  readBlockId,
  writeBlockId,
  serializeImageHeader,
  deserializeImageHeader
} from './block-format'
export type { ImageHeader } from './block-format'
export { serializeClientState, deserializeClientState } from './state-format'
export type { StoredClientState } from './state-format'
export {
  ConfigurationError,
  StashOverflowError,
  CorruptStateError
} from './errors'
export { StoreLockedError, LockPermissionError } from './file-lock'
export { emptyBlockId, oramOp } from './constants'
export type {
  OramOp,
  IdBlock,
  Bucket,
  OramGeometry,
  BucketAccessKind,
  BucketObserver,
  PathSampler,
  PathOramOptions,
  OramStats,
  SamplerName,
  OramStoreOptions
} from './types'
