/**
 * Backend Registry
 *
 * Maps a file suffix to the backend that loads and saves flat mappings in
 * that format. The resolution engine only ever talks to backends through a
 * registry, so new formats need no engine changes.
 */

import path from 'node:path'
import type { Backend } from '../types.js'
import { UnsupportedFormatError } from '../lib/errors.js'
import { iniBackend } from './ini.js'
import { jsonBackend } from './json.js'
import { yamlBackend } from './yaml.js'
import { envFileBackend } from './env-file.js'

function normalizeSuffix(suffix: string): string {
  const lowered = suffix.trim().toLowerCase()
  return lowered.startsWith('.') ? lowered : `.${lowered}`
}

export class BackendRegistry {
  private readonly backends = new Map<string, Backend>()

  register(suffix: string, backend: Backend): this {
    this.backends.set(normalizeSuffix(suffix), backend)
    return this
  }

  unregister(suffix: string): boolean {
    return this.backends.delete(normalizeSuffix(suffix))
  }

  has(suffix: string): boolean {
    return this.backends.has(normalizeSuffix(suffix))
  }

  suffixes(): string[] {
    return [...this.backends.keys()].sort()
  }

  /**
   * Backend for `filePath`, chosen by its extension.
   * A `.env` file has no extension to Node, so basenames are checked too.
   */
  getBackendForPath(filePath: string): Backend {
    const ext = path.extname(filePath).toLowerCase()
    const base = path.basename(filePath).toLowerCase()
    const backend = this.backends.get(ext) ?? (ext === '' ? this.backends.get(base) : undefined)

    if (!backend) {
      throw new UnsupportedFormatError(filePath, this.suffixes())
    }
    return backend
  }

  clone(): BackendRegistry {
    const copy = new BackendRegistry()
    for (const [suffix, backend] of this.backends) {
      copy.register(suffix, backend)
    }
    return copy
  }
}

export function createDefaultRegistry(): BackendRegistry {
  return new BackendRegistry()
    .register('.ini', iniBackend)
    .register('.json', jsonBackend)
    .register('.yaml', yamlBackend)
    .register('.yml', yamlBackend)
    .register('.env', envFileBackend)
}

/**
 * Process-wide registry used when an engine is not given its own
 */
export const defaultRegistry = createDefaultRegistry()

export function registerBackend(suffix: string, backend: Backend): void {
  defaultRegistry.register(suffix, backend)
}

export function getBackendForPath(filePath: string): Backend {
  return defaultRegistry.getBackendForPath(filePath)
}

export function listBackendSuffixes(): string[] {
  return defaultRegistry.suffixes()
}

export { iniBackend, parseIni, serializeIni } from './ini.js'
export { jsonBackend } from './json.js'
export { yamlBackend } from './yaml.js'
export { envFileBackend, serializeEnvFile } from './env-file.js'
