/**
 * .env backend
 *
 * Dotted keys are written as-is (`db.host=localhost`); dotenv accepts dots
 * in variable names. Parsing is delegated to dotenv.
 */

import dotenv from 'dotenv'
import type { Backend, Mapping } from '../types.js'
import { BackendError } from '../lib/errors.js'
import { writeFileAtomic } from '../lib/atomic-write.js'
import { assertValidKey } from '../lib/setting-keys.js'
import { loadedKey, readSourceFile } from './shared.js'

const BARE_VALUE = /^[^\s'"`#\\]*$/

// dotenv expands \n and \r escapes inside double quotes only
const QUOTES = ["'", '`', '"'] as const

function quoteValue(key: string, value: string): string {
  if (BARE_VALUE.test(value)) {
    return value
  }

  for (const quote of QUOTES) {
    if (value.includes(quote)) continue
    if (quote === '"' && /\\[nr]/.test(value)) continue
    return `${quote}${value}${quote}`
  }

  throw new BackendError(
    `Value of "${key}" cannot be represented in a .env file`,
    'UNREPRESENTABLE_VALUE',
    {
      suggestion: 'Use an .ini, .json or .yaml settings file for this value',
      context: { key }
    }
  )
}

export function serializeEnvFile(mapping: Mapping): string {
  const lines = Object.keys(mapping)
    .sort()
    .map(key => `${assertValidKey(key)}=${quoteValue(key, mapping[key])}`)

  return lines.length > 0 ? `${lines.join('\n')}\n` : ''
}

export const envFileBackend: Backend = {
  name: 'env',

  load(filePath: string): Mapping {
    const result: Mapping = {}
    for (const [key, value] of Object.entries(dotenv.parse(readSourceFile(filePath)))) {
      result[loadedKey(key, filePath)] = value
    }
    return result
  },

  save(filePath: string, mapping: Mapping): void {
    writeFileAtomic(filePath, serializeEnvFile(mapping))
  }
}
