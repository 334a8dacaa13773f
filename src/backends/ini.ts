/**
 * INI backend
 *
 * Format:
 *   debug = true        # keys before the first header are root keys
 *
 *   [db]
 *   host = localhost    # db.host
 *   pool.size = 5       # db.pool.size
 *
 * Lines starting with `#` or `;` are comments. Values that would not survive
 * trimming (surrounding whitespace, line breaks, a leading quote) are written
 * as JSON strings.
 */

import type { Backend, Mapping } from '../types.js'
import { CorruptFileError } from '../lib/errors.js'
import { writeFileAtomic } from '../lib/atomic-write.js'
import { ROOT_SECTION, joinKey } from '../lib/setting-keys.js'
import { loadedKey, readSourceFile, toSections } from './shared.js'

function needsQuotes(value: string): boolean {
  return value !== value.trim() || /[\r\n]/.test(value) || value.startsWith('"')
}

function encodeValue(value: string): string {
  return needsQuotes(value) ? JSON.stringify(value) : value
}

function decodeValue(raw: string): string {
  if (raw.length < 2 || !raw.startsWith('"') || !raw.endsWith('"')) {
    return raw
  }
  try {
    const parsed: unknown = JSON.parse(raw)
    return typeof parsed === 'string' ? parsed : raw
  } catch {
    return raw
  }
}

export function parseIni(content: string, filePath: string): Mapping {
  const result: Mapping = {}
  let section = ROOT_SECTION

  content.split(/\r?\n/).forEach((line, index) => {
    const trimmed = line.trim()
    const lineNo = index + 1

    // Skip empty lines and comments
    if (!trimmed || trimmed.startsWith('#') || trimmed.startsWith(';')) {
      return
    }

    if (trimmed.startsWith('[')) {
      if (!trimmed.endsWith(']')) {
        throw new CorruptFileError(filePath, `line ${lineNo}: unterminated section header`)
      }
      const name = trimmed.slice(1, -1).trim()
      if (!name) {
        throw new CorruptFileError(filePath, `line ${lineNo}: empty section name`)
      }
      section = name
      return
    }

    const eqIndex = trimmed.indexOf('=')
    if (eqIndex === -1) {
      throw new CorruptFileError(filePath, `line ${lineNo}: expected "key = value"`)
    }

    const leaf = trimmed.slice(0, eqIndex).trim()
    if (!leaf) {
      throw new CorruptFileError(filePath, `line ${lineNo}: missing key`)
    }

    const key = loadedKey(joinKey(section, leaf), filePath, `line ${lineNo}`)
    result[key] = decodeValue(trimmed.slice(eqIndex + 1).trim())
  })

  return result
}

export function serializeIni(mapping: Mapping): string {
  const blocks: string[] = []

  for (const [name, entries] of toSections(mapping)) {
    const lines = entries.map(([leaf, value]) => `${leaf} = ${encodeValue(value)}`)
    if (name !== ROOT_SECTION) {
      lines.unshift(`[${name}]`)
    }
    blocks.push(lines.join('\n'))
  }

  return blocks.length > 0 ? `${blocks.join('\n\n')}\n` : ''
}

export const iniBackend: Backend = {
  name: 'ini',

  load(filePath: string): Mapping {
    return parseIni(readSourceFile(filePath), filePath)
  },

  save(filePath: string, mapping: Mapping): void {
    writeFileAtomic(filePath, serializeIni(mapping))
  }
}
