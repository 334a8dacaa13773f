/**
 * YAML backend, same document shape as the JSON backend:
 *
 *   db:
 *     host: localhost
 *     port: 5432
 */

import { parse as parseYaml, stringify as stringifyYaml } from 'yaml'
import type { Backend, Mapping } from '../types.js'
import { CorruptFileError } from '../lib/errors.js'
import { writeFileAtomic } from '../lib/atomic-write.js'
import { mappingToObject, objectToMapping, readSourceFile } from './shared.js'

export const yamlBackend: Backend = {
  name: 'yaml',

  load(filePath: string): Mapping {
    const content = readSourceFile(filePath)
    if (!content.trim()) return {}

    let document: unknown
    try {
      document = parseYaml(content)
    } catch (err) {
      throw new CorruptFileError(filePath, err instanceof Error ? err.message : String(err), err)
    }
    return objectToMapping(document, filePath)
  },

  save(filePath: string, mapping: Mapping): void {
    writeFileAtomic(filePath, stringifyYaml(mappingToObject(mapping)))
  }
}
