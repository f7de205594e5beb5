/**
 * In-process implementation of {@link BufrMessage} over already-decoded
 * key/value pairs.
 *
 * Keys ending in `->code` (or any other `->attribute`) are stored as key
 * attributes: readable through `get`, but not part of the iteration order.
 * Control keys written with `set` are recorded separately and exposed
 * through `controls`, so they never leak into the data key order.
 */
import type { BufrMessage, BufrValue } from '../types.js'

const ATTRIBUTE_SEPARATOR = '->'

export class InMemoryBufrMessage implements BufrMessage {
  private readonly values = new Map<string, BufrValue>()
  private readonly attributes = new Map<string, BufrValue>()
  private readonly controlValues = new Map<string, number>()

  constructor(entries: Iterable<readonly [string, BufrValue]>) {
    for (const [key, value] of entries) {
      if (key.includes(ATTRIBUTE_SEPARATOR)) {
        this.attributes.set(key, value)
      } else {
        this.values.set(key, value)
      }
    }
  }

  /** Builds a message from a plain object; property order is the key order. */
  static fromRecord(record: Readonly<Record<string, BufrValue>>): InMemoryBufrMessage {
    return new InMemoryBufrMessage(Object.entries(record))
  }

  *[Symbol.iterator](): Iterator<string> {
    yield* this.values.keys()
  }

  get(key: string): BufrValue | undefined {
    if (key.includes(ATTRIBUTE_SEPARATOR)) return this.attributes.get(key)
    return this.values.get(key)
  }

  set(key: string, value: number): void {
    this.controlValues.set(key, value)
  }

  /** Control keys set on this message, in the order they were first set. */
  get controls(): ReadonlyMap<string, number> {
    return this.controlValues
  }
}
