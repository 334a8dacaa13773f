/**
 * Sigil Config Loader
 *
 * Loads library settings from `<configHome>/config.yaml`, merges
 * `config.local.yaml` over it when present, then applies SIGIL_* env
 * overrides.
 */

import fs from 'node:fs'
import path from 'node:path'
import { parse as parseYaml } from 'yaml'
import type { SigilConfig } from '../types.js'
import { InvalidConfigError } from './errors.js'
import { parsePolicyMode } from './scope-policy.js'
import { userConfigDir } from './paths.js'

export const CONFIG_FILE = 'config.yaml'
export const CONFIG_LOCAL_FILE = 'config.local.yaml'

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: SigilConfig = {
  policy: 'project_over_user',
  settings_filename: 'settings.ini',
  default_write_scope: 'user',
  verbose: false,
  vault: {
    passphrase_env: 'SIGIL_MASTER_PWD'
  }
}

export interface LoadConfigOptions {
  /** Directory holding config.yaml (default: the user config dir) */
  configHome?: string
  env?: NodeJS.ProcessEnv
}

/**
 * Expand environment variables in a string
 * Supports: ${VAR}, ${VAR:-default}, $VAR
 */
export function expandEnvVars(str: string, env: NodeJS.ProcessEnv = process.env): string {
  // Handle ${VAR:-default} syntax
  str = str.replace(/\$\{([^}:]+):-([^}]*)\}/g, (_match: string, varName: string, defaultValue: string) => {
    return env[varName] || defaultValue
  })

  // Handle ${VAR} syntax
  str = str.replace(/\$\{([^}]+)\}/g, (_match: string, varName: string) => {
    return env[varName] || ''
  })

  // Handle $VAR syntax (word boundary)
  str = str.replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_match: string, varName: string) => {
    return env[varName] || ''
  })

  return str
}

/**
 * Recursively expand env vars in parsed YAML
 */
function expandEnvVarsInValue(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    return expandEnvVars(value, env)
  }

  if (Array.isArray(value)) {
    return value.map(item => expandEnvVarsInValue(item, env))
  }

  if (isPlainObject(value)) {
    const result: Record<string, unknown> = {}
    for (const [key, item] of Object.entries(value)) {
      result[key] = expandEnvVarsInValue(item, env)
    }
    return result
  }

  return value
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Load a single config file; a missing file is an empty config
 */
function loadConfigFile(configPath: string, env: NodeJS.ProcessEnv): Record<string, unknown> {
  if (!fs.existsSync(configPath)) {
    return {}
  }

  const content = fs.readFileSync(configPath, 'utf-8')
  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (err) {
    throw new InvalidConfigError(err instanceof Error ? err.message : String(err), configPath, err)
  }

  if (parsed === null || parsed === undefined) {
    return {}
  }
  if (!isPlainObject(parsed)) {
    throw new InvalidConfigError('top level must be a mapping', configPath)
  }

  // Expand environment variables in all string values
  const expanded = expandEnvVarsInValue(parsed, env)
  return isPlainObject(expanded) ? expanded : {}
}

/**
 * Deep merge two config objects
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target }

  for (const [key, sourceValue] of Object.entries(source)) {
    const targetValue = result[key]

    if (isPlainObject(sourceValue) && isPlainObject(targetValue)) {
      // Deep merge objects
      result[key] = deepMerge(targetValue, sourceValue)
    } else if (sourceValue !== undefined) {
      // Override with source value
      result[key] = sourceValue
    }
  }

  return result
}

function defaultsRecord(): Record<string, unknown> {
  return {
    policy: DEFAULT_CONFIG.policy,
    settings_filename: DEFAULT_CONFIG.settings_filename,
    default_write_scope: DEFAULT_CONFIG.default_write_scope,
    verbose: DEFAULT_CONFIG.verbose,
    vault: { ...DEFAULT_CONFIG.vault }
  }
}

function isTruthyFlag(value: string): boolean {
  return /^(1|true|yes|on)$/i.test(value.trim())
}

/**
 * Check the merged document and narrow it to SigilConfig
 */
function validateConfig(data: Record<string, unknown>, configPath: string): SigilConfig {
  const policy = typeof data.policy === 'string' ? parsePolicyMode(data.policy) : null
  if (!policy) {
    throw new InvalidConfigError(
      `policy must be "project_over_user" or "user_over_project" (got ${JSON.stringify(data.policy)})`,
      configPath
    )
  }

  const settingsFilename = data.settings_filename
  if (
    typeof settingsFilename !== 'string' ||
    settingsFilename === '' ||
    settingsFilename !== path.basename(settingsFilename) ||
    path.extname(settingsFilename) === ''
  ) {
    throw new InvalidConfigError('settings_filename must be a bare file name with a suffix', configPath)
  }

  const writeScope = data.default_write_scope
  if (typeof writeScope !== 'string' || writeScope === '') {
    throw new InvalidConfigError('default_write_scope must be a non-empty string', configPath)
  }

  const verbose = typeof data.verbose === 'string' ? isTruthyFlag(data.verbose) : data.verbose
  if (typeof verbose !== 'boolean') {
    throw new InvalidConfigError('verbose must be a boolean', configPath)
  }

  const vault = data.vault
  if (!isPlainObject(vault)) {
    throw new InvalidConfigError('vault must be a mapping', configPath)
  }
  if (typeof vault.passphrase_env !== 'string' || vault.passphrase_env === '') {
    throw new InvalidConfigError('vault.passphrase_env must be a non-empty string', configPath)
  }
  const iterations = vault.iterations
  if (iterations !== undefined && (typeof iterations !== 'number' || !Number.isInteger(iterations) || iterations < 1)) {
    throw new InvalidConfigError('vault.iterations must be a positive integer', configPath)
  }

  return {
    policy,
    settings_filename: settingsFilename,
    default_write_scope: writeScope,
    verbose,
    vault: {
      passphrase_env: vault.passphrase_env,
      ...(iterations !== undefined ? { iterations } : {})
    }
  }
}

export function configPathFor(configHome: string): string {
  return path.join(configHome, CONFIG_FILE)
}

/**
 * Load library configuration
 *
 * Precedence: SIGIL_POLICY / SIGIL_VERBOSE > config.local.yaml > config.yaml > defaults
 */
export function loadSigilConfig(options: LoadConfigOptions = {}): SigilConfig {
  const env = options.env ?? process.env
  const configHome = options.configHome ?? userConfigDir(env)
  const configPath = configPathFor(configHome)

  let merged = deepMerge(defaultsRecord(), loadConfigFile(configPath, env))

  // Local overrides (machine-specific, not committed)
  const localConfig = loadConfigFile(path.join(configHome, CONFIG_LOCAL_FILE), env)
  if (Object.keys(localConfig).length > 0) {
    merged = deepMerge(merged, localConfig)
  }

  if (env.SIGIL_POLICY) {
    merged.policy = env.SIGIL_POLICY
  }
  if (env.SIGIL_VERBOSE !== undefined) {
    merged.verbose = isTruthyFlag(env.SIGIL_VERBOSE)
  }

  return validateConfig(merged, configPath)
}
