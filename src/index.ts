export * from './path-oram'
export {
  AddressTranslator,
  WeightAddressTranslator,
  ThresholdAddressTranslator,
  ceilDiv
} from './address-translator'
export type {
  LayerLayout,
  BlockLocation,
  WeightShape,
  ThresholdShape
} from './address-translator'
export { BlockCache } from './block-cache'
export type { BlockSource } from './block-cache'
export {
  ParameterReader,
  WeightReader,
  ThresholdReader,
  writeLayer,
  encodeLittleEndian,
  decodeLittleEndian
} from './parameter-reader'
export type { BlockSink } from './parameter-reader'
export {
  SparseSet,
  ResourcePool,
  BoundedTreeMap,
  ImplicitTreeMap,
  defaultCompare
} from './containers'
export type {
  PoolHandle,
  EmplaceResult,
  BoundedOrderedMap,
  Comparator,
  MapInsertResult
} from './containers'
