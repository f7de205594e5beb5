import { z } from 'zod'
import { filterSpecSchema } from './filters/filter.js'
import type { FilterSpec } from './filters/filter.js'
import { UNFILTERABLE_KEY_NAMES } from './extract/computed-keys.js'

// ---------------------------------------------------------------------------
// Zod error formatting
// ---------------------------------------------------------------------------

/**
 * Formats a Zod issue path as a dot/bracket string.
 *
 * Examples:
 *   []                          → "(root)"
 *   ["filters", "pressure"]     → "filters.pressure"
 *   ["requiredColumns", 0]      → "requiredColumns[0]"
 */
export function formatZodPath(path: readonly (string | number)[]): string {
  if (path.length === 0) return '(root)'
  return path
    .map((seg, i) => (typeof seg === 'number' ? `[${seg}]` : i === 0 ? seg : `.${seg}`))
    .join('')
}

/** One indented `path: message` line per issue. */
export function formatZodErrors(issues: readonly z.ZodIssue[]): string {
  return issues.map((issue) => `  ${formatZodPath(issue.path)}: ${issue.message}`).join('\n')
}

// ---------------------------------------------------------------------------
// Field helpers
// ---------------------------------------------------------------------------

/**
 * Accepts any non-string iterable (Set, generator result...) where a list of
 * names is expected, by spreading it into an array before validation.
 */
function iterableToArray(v: unknown): unknown {
  if (typeof v === 'object' && v !== null && !Array.isArray(v) && Symbol.iterator in v) {
    return Array.from(v as Iterable<unknown>)
  }
  return v
}

const nameField = z.string().min(1, 'column names must not be empty')

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

/**
 * Options accepted by `filterStream`.
 */
export const streamOptionsSchema = z
  .object({
    /**
     * Value filters by attribute name. Observations whose value for a filtered
     * attribute does not match are not produced.
     */
    filters: z
      .record(nameField, filterSpecSchema)
      .superRefine((filters, ctx) => {
        for (const name of Object.keys(filters)) {
          if (UNFILTERABLE_KEY_NAMES.has(name)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: [name],
              message: `${name} cannot be filtered; filter on its input keys instead`,
            })
          }
        }
      })
      .default({}),
    /**
     * Columns every produced record must contain.
     * `true` = all requested columns, `false` = none, or an explicit list.
     */
    requiredColumns: z
      .preprocess(
        iterableToArray,
        z.union([z.boolean(), z.array(nameField)], {
          errorMap: () => ({ message: 'requiredColumns must be a boolean or an iterable of column names' }),
        })
      )
      .default(true),
    /**
     * Test filters against header keys before unpacking, skipping messages
     * that already fail. Keys absent before unpacking are not tested.
     */
    prefilterHeaders: z.boolean().default(false),
    /** Emit a `stream` metric through `emitMetric` when the stream ends. */
    emitMetrics: z.boolean().default(false),
  })
  .strip()

/**
 * A stored query: the columns to read plus the stream options.
 */
export const querySchema = streamOptionsSchema
  .extend({
    columns: z.preprocess(iterableToArray, z.array(nameField).min(1, 'columns must list at least one column')),
  })
  .strip()

// ---------------------------------------------------------------------------
// Exported types
// ---------------------------------------------------------------------------

/** Options as written by callers of `filterStream`. */
export interface FilterStreamOptions {
  readonly filters?: Readonly<Record<string, FilterSpec>>
  readonly requiredColumns?: boolean | Iterable<string>
  readonly prefilterHeaders?: boolean
  readonly emitMetrics?: boolean
}

/** Stream options with all defaults applied. */
export type StreamConfig = Readonly<z.infer<typeof streamOptionsSchema>>

/** A validated query. */
export type BufrQuery = Readonly<z.infer<typeof querySchema>>

/** Options accepted by {@link parseStreamOptions} and `parseQuery`. */
export interface ParseConfigOptions {
  /**
   * Called with the unknown top-level keys found in the input, which are
   * stripped from the result. By default no action is taken.
   */
  onUnknownKeys?: (keys: readonly string[]) => void
}

// ---------------------------------------------------------------------------
// ConfigValidationError
// ---------------------------------------------------------------------------

/**
 * Thrown when stream options or a query contain invalid values.
 * The original `ZodError` is preserved as `Error.cause`.
 */
export class ConfigValidationError extends Error {
  /** Structured list of validation failures, one per invalid field. */
  readonly issues: readonly z.ZodIssue[]

  constructor(subject: string, zodError: z.ZodError) {
    super(`${subject} invalid:\n${formatZodErrors(zodError.issues)}`, { cause: zodError })
    this.name = 'ConfigValidationError'
    this.issues = zodError.issues
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

// ---------------------------------------------------------------------------
// Parse functions
// ---------------------------------------------------------------------------

function reportUnknownKeys(
  raw: unknown,
  known: ReadonlySet<string>,
  options: ParseConfigOptions
): void {
  if (options.onUnknownKeys === undefined) return
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) return
  const unknownKeys = Object.keys(raw).filter((k) => !known.has(k))
  if (unknownKeys.length > 0) {
    options.onUnknownKeys(unknownKeys)
  }
}

const STREAM_OPTION_KEYS: ReadonlySet<string> = new Set(Object.keys(streamOptionsSchema.shape))
const QUERY_KEYS: ReadonlySet<string> = new Set(Object.keys(querySchema.shape))

/**
 * Validates raw stream options and applies defaults.
 *
 * @throws {ConfigValidationError} with a field-by-field breakdown.
 */
export function parseStreamOptions(raw: unknown, options: ParseConfigOptions = {}): StreamConfig {
  const result = streamOptionsSchema.safeParse(raw ?? {})
  if (!result.success) {
    throw new ConfigValidationError('BUFR stream options are', result.error)
  }
  reportUnknownKeys(raw, STREAM_OPTION_KEYS, options)
  return result.data
}

/**
 * Validates a raw query document (as read from YAML or JSON) and applies defaults.
 *
 * @throws {ConfigValidationError} with a field-by-field breakdown.
 */
export function parseQuery(raw: unknown, options: ParseConfigOptions = {}): BufrQuery {
  const result = querySchema.safeParse(raw)
  if (!result.success) {
    throw new ConfigValidationError('BUFR query is', result.error)
  }
  reportUnknownKeys(raw, QUERY_KEYS, options)
  return result.data
}
