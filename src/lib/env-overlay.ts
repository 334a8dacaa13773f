/**
 * Environment overlay
 *
 * `SIGIL_<PROVIDER>_<KEY>` overrides dotted key `<key>` for a provider:
 *
 *   SIGIL_DEMO_UI_COLOR=blue   →  demo: ui.color = "blue"
 *   SIGIL_MY_APP_DB_HOST=x     →  my-app: db.host = "x"
 *
 * The mapping is rebuilt from the live environment on every read.
 */

import type { Mapping, OverlayReader } from '../types.js'
import { debug } from './logger.js'
import { isValidKey, toEnvSegment } from './setting-keys.js'

export const ENV_PREFIX = 'SIGIL_'

export function envPrefixFor(providerId: string, prefix: string = ENV_PREFIX): string {
  return `${prefix}${toEnvSegment(providerId)}_`
}

/**
 * Environment variable name that overrides `key` for `providerId`
 */
export function envVarName(providerId: string, key: string, prefix: string = ENV_PREFIX): string {
  return `${envPrefixFor(providerId, prefix)}${toEnvSegment(key)}`
}

export function readEnv(providerId: string, env: NodeJS.ProcessEnv = process.env): Mapping {
  const prefix = envPrefixFor(providerId)
  const result: Mapping = {}

  for (const [name, value] of Object.entries(env)) {
    if (value === undefined || !name.startsWith(prefix)) continue

    const key = name.slice(prefix.length).toLowerCase().replace(/_/g, '.')
    if (!isValidKey(key)) {
      debug(`ignoring ${name}: does not map to a valid key`)
      continue
    }
    result[key] = value
  }

  return result
}

/**
 * Key of an overlay mapping that a lookup of `key` hits: `key` itself, or
 * the entry with the same variable-name form. `readEnv` cannot tell `_`
 * from `.` so `SIGIL_DEMO_DB_MAX_SIZE` arrives as `db.max.size` and must
 * still answer `db.max_size`.
 */
export function findOverlayKey(mapping: Readonly<Mapping>, key: string): string | undefined {
  if (Object.hasOwn(mapping, key)) return key
  const wanted = toEnvSegment(key)
  return Object.keys(mapping).find(candidate => toEnvSegment(candidate) === wanted)
}

/**
 * Overlay reader bound to a specific environment object
 */
export function createEnvReader(env: NodeJS.ProcessEnv = process.env): OverlayReader {
  return providerId => readEnv(providerId, env)
}
