import { readFile } from 'node:fs/promises'
import { parse as yamlParse } from 'yaml'
import type { BufrQuery, ParseConfigOptions } from '../config.js'
import { parseQuery } from '../config.js'

/**
 * Thrown by {@link loadQuery} when the query file does not exist.
 */
export class QueryFileNotFoundError extends Error {
  readonly filePath: string

  constructor(filePath: string) {
    super(`BUFR query file not found: ${filePath}`)
    this.name = 'QueryFileNotFoundError'
    this.filePath = filePath
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

function isEnoent(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    (err as NodeJS.ErrnoException).code === 'ENOENT'
  )
}

/**
 * Reads and validates a query stored as YAML (JSON documents are valid YAML):
 *
 * ```yaml
 * columns: [stationNumber, pressure, airTemperature]
 * filters:
 *   stationNumber: [1, 2, 3]
 *   pressure: { min: 50000 }
 * requiredColumns: [stationNumber, pressure]
 * ```
 *
 * Unknown top-level keys are stripped and logged.
 *
 * @throws {QueryFileNotFoundError} if `filePath` does not exist.
 * @throws {ConfigValidationError} if the document is not a valid query.
 * @throws If the file is not well-formed YAML.
 */
export async function loadQuery(filePath: string, options: ParseConfigOptions = {}): Promise<BufrQuery> {
  let text: string
  try {
    text = await readFile(filePath, 'utf-8')
  } catch (err) {
    if (isEnoent(err)) throw new QueryFileNotFoundError(filePath)
    throw err
  }

  const raw = yamlParse(text) as unknown
  return parseQuery(raw, {
    onUnknownKeys:
      options.onUnknownKeys ??
      ((keys) => console.warn(`[bufr] loadQuery: ${filePath} has unknown key(s): ${keys.join(', ')}`)),
  })
}
