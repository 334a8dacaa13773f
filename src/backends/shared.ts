/**
 * Helpers shared by the file backends
 */

import fs from 'node:fs'
import type { Mapping } from '../types.js'
import { CorruptFileError, FileNotFoundError, isNotFound } from '../lib/errors.js'
import { ROOT_SECTION, assertValidKey, isValidKey, joinKey, splitKey } from '../lib/setting-keys.js'

type Scalar = string | number | boolean

/**
 * Read a backend source file, mapping a missing file (or missing parent
 * directory) to FileNotFoundError
 */
export function readSourceFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8')
  } catch (err) {
    if (isNotFound(err)) {
      throw new FileNotFoundError(filePath, err)
    }
    throw err
  }
}

/**
 * Key read from a file, rejected as corrupt when it is not a valid setting
 * key so that a later save of the same mapping cannot fail on it
 */
export function loadedKey(key: string, filePath: string, where?: string): string {
  if (!isValidKey(key)) {
    throw new CorruptFileError(filePath, `${where ? `${where}: ` : ''}invalid key "${key}"`)
  }
  return key
}

/**
 * Group a flat mapping into sorted sections of sorted leaves.
 * The root section, when present, comes first.
 */
export function toSections(mapping: Mapping): Map<string, Array<[string, string]>> {
  const grouped = new Map<string, Array<[string, string]>>()

  for (const key of Object.keys(mapping).sort()) {
    assertValidKey(key)
    const { section, leaf } = splitKey(key)
    const entries = grouped.get(section) ?? []
    entries.push([leaf, mapping[key]])
    grouped.set(section, entries)
  }

  const ordered = new Map<string, Array<[string, string]>>()
  const root = grouped.get(ROOT_SECTION)
  if (root) ordered.set(ROOT_SECTION, root)
  for (const name of [...grouped.keys()].sort()) {
    if (name === ROOT_SECTION) continue
    const entries = grouped.get(name)
    if (entries) ordered.set(name, entries)
  }
  return ordered
}

function isScalar(value: unknown): value is Scalar {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Flatten an object-of-objects document (JSON, YAML) into a mapping.
 * Top-level scalars are root keys; anything deeper than one section level
 * is rejected as corrupt.
 */
export function objectToMapping(document: unknown, filePath: string): Mapping {
  if (document === null || document === undefined) {
    return {}
  }
  if (!isPlainObject(document)) {
    throw new CorruptFileError(filePath, 'top-level value must be an object')
  }

  const result: Mapping = {}

  for (const [name, value] of Object.entries(document)) {
    if (isScalar(value)) {
      result[loadedKey(name, filePath)] = String(value)
      continue
    }
    if (!isPlainObject(value)) {
      throw new CorruptFileError(filePath, `"${name}" must be a scalar or a section object`)
    }
    for (const [leaf, leafValue] of Object.entries(value)) {
      if (!isScalar(leafValue)) {
        throw new CorruptFileError(filePath, `"${name}.${leaf}" must be a scalar`)
      }
      result[loadedKey(joinKey(name, leaf), filePath)] = String(leafValue)
    }
  }

  return result
}

/**
 * Inverse of objectToMapping. Root keys become top-level scalars unless one
 * of them shares its name with a section, in which case they are grouped
 * under an explicit `__root__` section.
 */
export function mappingToObject(mapping: Mapping): Record<string, string | Record<string, string>> {
  const sections = toSections(mapping)
  const root = sections.get(ROOT_SECTION) ?? []
  const collides = root.some(([leaf]) => sections.has(leaf))
  const document: Record<string, string | Record<string, string>> = {}

  if (collides) {
    document[ROOT_SECTION] = Object.fromEntries(root)
  } else {
    for (const [leaf, value] of root) {
      document[leaf] = value
    }
  }

  for (const [name, entries] of sections) {
    if (name === ROOT_SECTION) continue
    document[name] = Object.fromEntries(entries)
  }

  return document
}
