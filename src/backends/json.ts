/**
 * JSON backend: an object of section objects, `{ "db": { "host": "x" } }`
 */

import type { Backend, Mapping } from '../types.js'
import { CorruptFileError } from '../lib/errors.js'
import { writeFileAtomic } from '../lib/atomic-write.js'
import { mappingToObject, objectToMapping, readSourceFile } from './shared.js'

export const jsonBackend: Backend = {
  name: 'json',

  load(filePath: string): Mapping {
    const content = readSourceFile(filePath)
    if (!content.trim()) return {}

    let document: unknown
    try {
      document = JSON.parse(content)
    } catch (err) {
      throw new CorruptFileError(filePath, err instanceof Error ? err.message : String(err), err)
    }
    return objectToMapping(document, filePath)
  },

  save(filePath: string, mapping: Mapping): void {
    writeFileAtomic(filePath, `${JSON.stringify(mappingToObject(mapping), null, 2)}\n`)
  }
}
