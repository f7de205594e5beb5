export { CODES_MISSING_DOUBLE, isBufrScalar, isBufrArray } from './types.js'
export type {
  BufrScalar,
  BufrValue,
  ObservationValue,
  Observation,
  BufrMessage,
  BufrKey,
  LeveledKey,
} from './types.js'

export {
  parseStreamOptions,
  parseQuery,
  streamOptionsSchema,
  querySchema,
  ConfigValidationError,
} from './config.js'
export type { FilterStreamOptions, StreamConfig, BufrQuery, ParseConfigOptions } from './config.js'

export { InMemoryBufrMessage } from './message/in-memory-message.js'
export { BufrKeyNotFoundError, readOptional, readRequired, readDescriptorClass } from './message/lookup.js'

export { bareName, rankedKey, bufrKeyFromLevelKey, isSameBufrKey } from './structure/bufr-key.js'
export { IS_KEY_COORD, isCoordinateKey, messageStructure } from './structure/message-structure.js'
export { filterKeys, StructureCache } from './structure/filter-keys.js'
export { makeMessageFingerprint } from './structure/fingerprint.js'
export type { MessageFingerprint } from './structure/fingerprint.js'

export {
  filterSpecSchema,
  compileFilter,
  compileFilters,
  matchFilter,
  filterMax,
  isMatch,
} from './filters/filter.js'
export type { FilterSpec, BufrFilter, SetFilter, RangeFilter, IsMatchOptions } from './filters/filter.js'

export { extractObservations, isCompressed, subsetCount } from './extract/observations.js'
export {
  COMPUTED_KEYS,
  COMPUTED_KEY_NAMES,
  UNFILTERABLE_KEY_NAMES,
  addComputedKeys,
  withComputedDependencies,
} from './extract/computed-keys.js'
export type { ComputedKey, ComputedKeyGetter } from './extract/computed-keys.js'

export { filterStream, COUNT_KEY } from './stream.js'

export { loadQuery, QueryFileNotFoundError } from './query/query-file.js'

export { createMetricEvent, emitMetric } from './metrics/index.js'
export type { StreamMetrics, MetricData, MetricEvent } from './metrics/index.js'
