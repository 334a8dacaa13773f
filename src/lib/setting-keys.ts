/**
 * Dotted setting keys
 *
 * `db.host` lives in section `db` as leaf `host`; `db.pool.size` lives in
 * section `db` as leaf `pool.size`; single-segment keys live in the
 * `__root__` section.
 */

import { InvalidKeyError } from './errors.js'

export const ROOT_SECTION = '__root__'
export const SECRET_PREFIX = 'secret.'

const KEY_PATTERN = /^[A-Za-z0-9_-]+(\.[A-Za-z0-9_-]+)*$/
const RESERVED_SEGMENTS = new Set(['__proto__', 'prototype', 'constructor'])

export interface SplitKey {
  section: string
  leaf: string
}

export function isValidKey(key: string): boolean {
  if (!KEY_PATTERN.test(key)) return false
  return !key.split('.').some(segment => RESERVED_SEGMENTS.has(segment))
}

export function assertValidKey(key: string): string {
  if (!isValidKey(key)) {
    throw new InvalidKeyError(key)
  }
  return key
}

export function splitKey(key: string): SplitKey {
  const dot = key.indexOf('.')
  if (dot === -1) {
    return { section: ROOT_SECTION, leaf: key }
  }
  return { section: key.slice(0, dot), leaf: key.slice(dot + 1) }
}

export function joinKey(section: string, leaf: string): string {
  return section === ROOT_SECTION ? leaf : `${section}.${leaf}`
}

export function isSecretKey(key: string): boolean {
  return key.startsWith(SECRET_PREFIX)
}

export function stripSecretPrefix(key: string): string {
  return isSecretKey(key) ? key.slice(SECRET_PREFIX.length) : key
}

/**
 * Upper snake case used for environment variable segments
 * (`my-app` → `MY_APP`, `ui.color` → `UI_COLOR`)
 */
export function toEnvSegment(value: string): string {
  return value.replace(/[.-]/g, '_').toUpperCase()
}
