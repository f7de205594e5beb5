/**
 * Streaming entry point: reads messages one by one and yields flat records
 * holding the requested columns.
 *
 * Per message: count filter → optional header prefilter → unpack →
 * cached key structure → observation extraction → computed keys →
 * column projection → required-column check.
 */
import type { BufrMessage, Observation } from './types.js'
import type { FilterStreamOptions, StreamConfig } from './config.js'
import { parseStreamOptions } from './config.js'
import type { BufrFilter } from './filters/filter.js'
import { compileFilters, filterMax, isMatch, matchFilter } from './filters/filter.js'
import { StructureCache } from './structure/filter-keys.js'
import { extractObservations } from './extract/observations.js'
import { COMPUTED_KEY_NAMES, addComputedKeys, withComputedDependencies } from './extract/computed-keys.js'
import { createMetricEvent, emitMetric } from './metrics/index.js'

/** Synthetic 1-based message counter, selectable and filterable like a key. */
export const COUNT_KEY = 'count'

/**
 * Yields one record per observation of every message in `messages`.
 *
 * Options are validated before this function returns, so invalid options
 * throw here and not on the first `next()`.
 *
 * @throws {ConfigValidationError} if `options` is invalid.
 */
export function filterStream(
  messages: Iterable<BufrMessage>,
  columns: Iterable<string>,
  options: FilterStreamOptions = {}
): Generator<Observation> {
  const config = parseStreamOptions(options, {
    onUnknownKeys: (keys) => {
      console.warn(`[bufr] filterStream: ignoring unknown option(s): ${keys.join(', ')}`)
    },
  })
  const columnList = typeof columns === 'string' ? [columns] : [...columns]
  return runStream(messages, columnList, config)
}

function resolveRequiredColumns(
  requiredColumns: StreamConfig['requiredColumns'],
  columns: readonly string[]
): readonly string[] {
  if (requiredColumns === true) return columns
  if (requiredColumns === false) return []
  return requiredColumns
}

function pickColumns(observation: Readonly<Observation>, columns: ReadonlySet<string>): Observation {
  const data: Observation = {}
  for (const [key, value] of Object.entries(observation)) {
    if (columns.has(key)) data[key] = value
  }
  return data
}

function matchesAll(observation: Readonly<Observation>, filters: Readonly<Record<string, BufrFilter>>): boolean {
  return Object.entries(filters).every(([name, filter]) => matchFilter(filter, observation[name]))
}

function* runStream(
  messages: Iterable<BufrMessage>,
  columns: readonly string[],
  config: StreamConfig
): Generator<Observation> {
  const requiredColumns = resolveRequiredColumns(config.requiredColumns, columns)
  const columnSet = new Set(columns)
  const compiledFilters = compileFilters(config.filters)
  const included = withComputedDependencies([...Object.keys(compiledFilters), ...columns])

  // Computed keys do not exist in the message: their filters run after
  // the keys are computed. Everything else is filtered during extraction.
  const extractionFilters: Record<string, BufrFilter> = {}
  const computedFilters: Record<string, BufrFilter> = {}
  const headerFilters: Record<string, BufrFilter> = {}
  for (const [name, filter] of Object.entries(compiledFilters)) {
    if (COMPUTED_KEY_NAMES.has(name)) {
      computedFilters[name] = filter
      continue
    }
    extractionFilters[name] = filter
    if (name !== COUNT_KEY) headerFilters[name] = filter
  }

  const countFilter = compiledFilters[COUNT_KEY]
  const countMax = countFilter !== undefined ? filterMax(countFilter) : undefined
  const maxCount = typeof countMax === 'number' ? countMax : undefined

  const cache = new StructureCache()
  let messagesRead = 0
  let messagesSkipped = 0
  let observationsYielded = 0
  let stoppedAtCountLimit = false

  try {
    for (const message of messages) {
      messagesRead += 1
      const count = messagesRead

      const skipped =
        (countFilter !== undefined && !matchFilter(countFilter, count)) ||
        (config.prefilterHeaders && !isMatch(message, headerFilters, { required: false }))

      if (skipped) {
        messagesSkipped += 1
      } else {
        message.set('skipExtraKeyAttributes', 1)
        message.set('unpack', 1)

        const filteredKeys = cache.filteredKeys(message, included)
        const baseObservation: Observation = included.has(COUNT_KEY) ? { [COUNT_KEY]: count } : {}

        for (const observation of extractObservations(message, filteredKeys, extractionFilters, baseObservation)) {
          const augmented = addComputedKeys(observation, included)
          if (!matchesAll(augmented, computedFilters)) continue
          const data = pickColumns(augmented, columnSet)
          if (requiredColumns.every((column) => Object.hasOwn(data, column))) {
            observationsYielded += 1
            yield data
          }
        }
      }

      // No later message can pass the count filter, skipped or not.
      if (maxCount !== undefined && count >= maxCount) {
        stoppedAtCountLimit = true
        break
      }
    }
  } finally {
    if (config.emitMetrics) {
      emitMetric(
        createMetricEvent({
          stage: 'stream',
          messagesRead,
          messagesSkipped,
          observationsYielded,
          structureCacheSize: cache.size,
          stoppedAtCountLimit,
        })
      )
    }
  }
}
