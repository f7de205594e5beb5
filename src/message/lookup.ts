import type { BufrMessage, BufrValue } from '../types.js'

// ---------------------------------------------------------------------------
// Errors
// ---------------------------------------------------------------------------

/**
 * Thrown when a key the engine selected for extraction cannot be read from
 * the message. Not caught anywhere inside the engine.
 */
export class BufrKeyNotFoundError extends Error {
  /** The full (possibly ranked) key that was requested. */
  readonly key: string

  constructor(key: string) {
    super(`BUFR key not found in message: ${key}`)
    this.name = 'BufrKeyNotFoundError'
    this.key = key
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

// ---------------------------------------------------------------------------
// Accessors
// ---------------------------------------------------------------------------

/**
 * Reads a key that may legitimately be absent (header fields, key attributes).
 * Returns undefined instead of throwing.
 */
export function readOptional(message: BufrMessage, key: string): BufrValue | undefined {
  return message.get(key)
}

/**
 * Reads a key that must exist.
 *
 * @throws {BufrKeyNotFoundError} if the decoder has no value for `key`.
 */
export function readRequired(message: BufrMessage, key: string): BufrValue {
  const value = message.get(key)
  if (value === undefined) {
    throw new BufrKeyNotFoundError(key)
  }
  return value
}

/**
 * Reads the element descriptor code of `key` (the `->code` key attribute).
 * Codes are `FXXYYY` descriptors, returned as a zero-padded string or a number.
 * Returns the numeric `FXX` class, or undefined when the key has no code.
 */
export function readDescriptorClass(message: BufrMessage, key: string): number | undefined {
  const code = readOptional(message, `${key}->code`)
  if (typeof code === 'string') {
    const fxx = Number.parseInt(code.slice(0, 3), 10)
    return Number.isNaN(fxx) ? undefined : fxx
  }
  if (typeof code === 'number' && Number.isFinite(code)) {
    return Math.floor(code / 1000)
  }
  return undefined
}
