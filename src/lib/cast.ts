/**
 * Value casting
 *
 * Auto-casting runs an ordered list of parse attempts, each returning a
 * tagged result; the first success wins and a string is the fallback:
 *
 *   int → float → bool → json → string
 */

import type { Caster, JsonValue, SettingValue } from '../types.js'
import { CastError } from './errors.js'

export type CastResult<T> = { ok: true; value: T } | { ok: false }

export interface ParseAttempt<T> {
  name: string
  parse: (raw: string) => CastResult<T>
}

const INT_PATTERN = /^[+-]?\d+$/
const FLOAT_PATTERN = /^[+-]?(\d+\.\d*|\.\d+|\d+)([eE][+-]?\d+)?$/

const TRUE_WORDS = new Set(['true', 'yes', '1'])
const FALSE_WORDS = new Set(['false', 'no', '0'])

const miss = { ok: false } as const

export const intAttempt: ParseAttempt<number> = {
  name: 'int',
  parse(raw) {
    const trimmed = raw.trim()
    if (!INT_PATTERN.test(trimmed)) return miss
    const value = Number(trimmed)
    return Number.isSafeInteger(value) ? { ok: true, value } : miss
  }
}

export const floatAttempt: ParseAttempt<number> = {
  name: 'float',
  parse(raw) {
    const trimmed = raw.trim()
    if (!FLOAT_PATTERN.test(trimmed)) return miss
    const value = Number(trimmed)
    // Integers past 2^53 would come back rounded
    if (INT_PATTERN.test(trimmed) && !Number.isSafeInteger(value)) return miss
    return Number.isFinite(value) ? { ok: true, value } : miss
  }
}

export const boolAttempt: ParseAttempt<boolean> = {
  name: 'bool',
  parse(raw) {
    const lowered = raw.trim().toLowerCase()
    if (TRUE_WORDS.has(lowered)) return { ok: true, value: true }
    if (FALSE_WORDS.has(lowered)) return { ok: true, value: false }
    return miss
  }
}

export const jsonAttempt: ParseAttempt<JsonValue[] | { [key: string]: JsonValue }> = {
  name: 'json',
  parse(raw) {
    const trimmed = raw.trim()
    if (!trimmed.startsWith('[') && !trimmed.startsWith('{')) return miss
    try {
      const value: unknown = JSON.parse(trimmed)
      return isJsonContainer(value) ? { ok: true, value } : miss
    } catch {
      return miss
    }
  }
}

function isJsonContainer(value: unknown): value is JsonValue[] | { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null
}

export const AUTO_CAST_CHAIN: ReadonlyArray<ParseAttempt<SettingValue>> = [
  intAttempt,
  floatAttempt,
  boolAttempt,
  jsonAttempt
]

/**
 * Auto-cast a raw stored string
 */
export function autoCast(raw: string): SettingValue {
  for (const attempt of AUTO_CAST_CHAIN) {
    const result = attempt.parse(raw)
    if (result.ok) return result.value
  }
  return raw
}

/**
 * Apply an explicit caster, turning any failure into a CastError
 */
export function applyCast<T>(key: string, raw: string, cast: Caster<T>): T {
  try {
    return cast(raw)
  } catch (err) {
    if (err instanceof CastError) throw err
    const reason = err instanceof Error ? err.message : String(err)
    throw new CastError(key, raw, reason, err)
  }
}

function strict<T>(attempt: ParseAttempt<T>): Caster<T> {
  return raw => {
    const result = attempt.parse(raw)
    if (!result.ok) {
      throw new TypeError(`not a valid ${attempt.name}`)
    }
    return result.value
  }
}

/**
 * Named casters for explicit use: `engine.get('db.port', { cast: casts.int })`
 */
export const casts = {
  int: strict(intAttempt),
  float: strict(floatAttempt),
  bool: strict(boolAttempt),
  json: strict(jsonAttempt),
  string: (raw: string): string => raw
} as const

/**
 * Serialise a value for storage: strings as-is, containers as JSON
 */
export function stringifyValue(value: SettingValue): string {
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  return JSON.stringify(value)
}
