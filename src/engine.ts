/**
 * Sigil Resolution Engine
 *
 * Resolves a dotted key for one provider by scanning the scopes of a
 * policy in precedence order; the first scope whose mapping contains the
 * key wins. Writes go to a single writable scope and replace its file
 * atomically.
 *
 * Per-scope mappings are cached until invalidateCache(); overlay scopes
 * (the environment) are read live on every access. Operations are
 * synchronous, so the cache is never observed half-updated within a
 * process. Other processes are only seen after invalidateCache().
 */

import path from 'node:path'
import { EventEmitter } from 'node:events'
import { AsyncLocalStorage } from 'node:async_hooks'
import type {
  Caster,
  ChangeEvent,
  ChangeListener,
  Mapping,
  OverlayReader,
  Scope,
  ScopeContext,
  SettingValue,
  SigilConfig
} from './types.js'
import { defaultRegistry, type BackendRegistry } from './backends/index.js'
import {
  DEFAULT_POLICY_MODE,
  ENV_SCOPE,
  createDefaultPolicy,
  defaultPolicy,
  type ScopePolicy
} from './lib/scope-policy.js'
import { FileNotFoundError, InvalidPolicyError, NotWritableError, SecretNotWritableError } from './lib/errors.js'
import { applyCast, autoCast, casts, stringifyValue } from './lib/cast.js'
import { ENV_PREFIX, createEnvReader, envVarName, findOverlayKey, readEnv } from './lib/env-overlay.js'
import { assertValidKey, isSecretKey, stripSecretPrefix } from './lib/setting-keys.js'
import { normalizeProviderId } from './lib/provider-id.js'
import { findProjectRoot, hostId, userConfigDir } from './lib/paths.js'
import { resolveDefaultsPath } from './lib/dev-links.js'
import { loadSigilConfig } from './lib/config-loader.js'
import { debug, log, setVerbose } from './lib/logger.js'
import { createDefaultSecretChain, defaultVaultPath, type KeyringBackend, type SecretChain } from './secrets/index.js'

const DEFAULT_WRITE_SCOPE = 'user'
const DEFAULT_SETTINGS_FILENAME = 'settings.ini'
const CHANGE_EVENT = 'change'

/** Scope reported in change events for writes to the secrets chain */
export const SECRETS_SCOPE = 'secrets'

export interface EngineOptions {
  providerId: string
  /** Captured at construction (default: the current process-wide policy) */
  policy?: ScopePolicy
  registry?: BackendRegistry
  /** Reader for the `env` overlay scope */
  envReader?: OverlayReader
  /** Readers for additional overlay scopes, by scope id */
  overlays?: Record<string, OverlayReader>
  /** Chain consulted first for `secret.` keys */
  secrets?: SecretChain
  /** Defaults file; null for none, omitted to run discovery */
  defaultsPath?: string | null
  /** In-memory defaults, overridden by the defaults file */
  defaults?: Record<string, SettingValue>
  projectRoot?: string
  userConfigDir?: string
  host?: string
  settingsFilename?: string
  defaultWriteScope?: string
}

export interface GetOptions<T> {
  default?: T
  cast?: Caster<T>
}

export interface ExportEnvOptions {
  /** Variable prefix (default SIGIL_) */
  prefix?: string
  /** Include `secret.` keys found in settings files */
  includeSecrets?: boolean
}

export class SigilEngine {
  readonly providerId: string
  readonly policy: ScopePolicy
  readonly registry: BackendRegistry
  readonly secrets: SecretChain | undefined

  private readonly context: ScopeContext
  private readonly overlays: Map<string, OverlayReader>
  private readonly cache = new Map<string, Readonly<Mapping>>()
  private readonly writeScopeStore = new AsyncLocalStorage<string>()
  private readonly events = new EventEmitter()
  private readonly builtinDefaults: Readonly<Mapping>
  private defaultWriteScopeId: string

  constructor(options: EngineOptions) {
    this.providerId = normalizeProviderId(options.providerId)
    this.policy = options.policy ?? defaultPolicy.get()
    this.registry = options.registry ?? defaultRegistry
    this.secrets = options.secrets

    const settingsFilename = options.settingsFilename ?? DEFAULT_SETTINGS_FILENAME
    const configDir = options.userConfigDir ?? userConfigDir()
    const projectRoot = options.projectRoot ?? findProjectRoot() ?? process.cwd()

    this.context = {
      providerId: this.providerId,
      host: options.host ?? hostId(),
      userConfigDir: configDir,
      projectRoot,
      defaultsPath: options.defaultsPath !== undefined
        ? options.defaultsPath
        : resolveDefaultsPath(this.providerId, { configHome: configDir, projectRoot, settingsFilename }),
      settingsFilename
    }

    const builtinDefaults: Mapping = {}
    for (const [key, value] of Object.entries(options.defaults ?? {})) {
      builtinDefaults[assertValidKey(key)] = stringifyValue(value)
    }
    this.builtinDefaults = Object.freeze(builtinDefaults)

    this.overlays = new Map(Object.entries(options.overlays ?? {}))
    if (!this.overlays.has(ENV_SCOPE)) {
      this.overlays.set(ENV_SCOPE, options.envReader ?? (providerId => readEnv(providerId)))
    }
    for (const scope of this.policy.scopes()) {
      if (scope.kind === 'overlay' && !this.overlays.has(scope.id)) {
        throw new InvalidPolicyError(`overlay scope "${scope.id}" has no reader`)
      }
    }

    this.defaultWriteScopeId = options.defaultWriteScope ?? DEFAULT_WRITE_SCOPE
    if (options.defaultWriteScope !== undefined) {
      this.writableScope(options.defaultWriteScope)
    }
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  get(key: string): SettingValue | undefined
  get<T>(key: string, options: { cast: Caster<T>; default: T }): T
  get<T>(key: string, options: { cast: Caster<T>; default?: T }): T | undefined
  get<D>(key: string, options: { default: D; cast?: undefined }): SettingValue | D
  get(key: string, options: GetOptions<unknown> = {}): unknown {
    const raw = this.lookupRaw(key)
    if (raw === undefined) {
      return options.default
    }
    return options.cast ? applyCast(key, raw, options.cast) : autoCast(raw)
  }

  getInt(key: string): number | undefined
  getInt(key: string, defaultValue: number): number
  getInt(key: string, defaultValue?: number): number | undefined {
    return this.get(key, { cast: casts.int, default: defaultValue })
  }

  getFloat(key: string): number | undefined
  getFloat(key: string, defaultValue: number): number
  getFloat(key: string, defaultValue?: number): number | undefined {
    return this.get(key, { cast: casts.float, default: defaultValue })
  }

  getBool(key: string): boolean | undefined
  getBool(key: string, defaultValue: boolean): boolean
  getBool(key: string, defaultValue?: boolean): boolean | undefined {
    return this.get(key, { cast: casts.bool, default: defaultValue })
  }

  getString(key: string): string | undefined
  getString(key: string, defaultValue: string): string
  getString(key: string, defaultValue?: string): string | undefined {
    return this.get(key, { cast: casts.string, default: defaultValue })
  }

  /**
   * Id of the scope that currently supplies `key`, or null
   */
  effectiveScopeFor(key: string): string | null {
    assertValidKey(key)
    for (const scope of this.policy.scopes()) {
      if (this.valueIn(scope, key) !== undefined) {
        return scope.id
      }
    }
    return null
  }

  listKeys(scopeId: string): string[] {
    return Object.keys(this.loadScope(this.policy.getScope(scopeId))).sort()
  }

  /**
   * Raw mapping of every scope, in precedence order
   */
  layers(): Record<string, Mapping> {
    const result: Record<string, Mapping> = {}
    for (const scope of this.policy.scopes()) {
      result[scope.id] = { ...this.loadScope(scope) }
    }
    return result
  }

  /**
   * Merged view of all scopes (raw strings, secrets chain not consulted)
   */
  effective(): Mapping {
    const merged: Mapping = {}
    for (const scope of [...this.policy.scopes()].reverse()) {
      const mapping = this.loadScope(scope)
      if (scope.kind !== 'overlay') {
        Object.assign(merged, mapping)
        continue
      }
      for (const [key, value] of Object.entries(mapping)) {
        merged[findOverlayKey(merged, key) ?? key] = value
      }
    }
    return merged
  }

  pathFor(scopeId: string): string | null {
    return this.policy.resolvePath(scopeId, this.context)
  }

  /**
   * Effective values as environment variables (`SIGIL_<PROVIDER>_<KEY>`)
   */
  exportEnv(options: ExportEnvOptions = {}): Record<string, string> {
    const prefix = options.prefix ?? ENV_PREFIX
    const result: Record<string, string> = {}

    for (const [key, value] of Object.entries(this.effective()).sort(([a], [b]) => a.localeCompare(b))) {
      if (isSecretKey(key) && !options.includeSecrets) continue
      result[envVarName(this.providerId, key, prefix)] = value
    }

    return result
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  /**
   * Store `value` under `key`. Without an explicit scope the write goes to
   * the active withWriteScope() block, else the default write scope.
   * `secret.` keys go to the secrets chain unless a scope is named.
   */
  set(key: string, value: SettingValue, scopeId?: string): void {
    assertValidKey(key)
    const stored = stringifyValue(value)

    const chain = this.secretsFor(key, scopeId)
    if (chain) {
      const provider = chain.set(stripSecretPrefix(key), stored)
      log(`${this.providerId}: stored ${key} in secret provider ${provider}`)
      this.emitChange({ key, value, scope: SECRETS_SCOPE, provider })
      return
    }

    const target = this.writeTarget(scopeId, key)
    if (this.applyToScope(target.scope, target.filePath, [[key, stored]]).length === 0) {
      debug(`${this.providerId}: ${key} unchanged in ${target.scope.id}`)
      return
    }
    log(`${this.providerId}: set ${key} in ${target.scope.id} (${target.filePath})`)
    this.emitChange({ key, value, scope: target.scope.id })
  }

  /**
   * Store several values with one write per file. Every key and the target
   * scope are checked before anything is written.
   */
  setMany(updates: Record<string, SettingValue>, scopeId?: string): void {
    const fileChanges: Array<[string, string]> = []
    const secretChanges: Array<[string, string]> = []

    for (const [key, value] of Object.entries(updates)) {
      assertValidKey(key)
      const changes = this.secretsFor(key, scopeId) ? secretChanges : fileChanges
      changes.push([key, stringifyValue(value)])
    }

    const chain = secretChanges.length > 0 ? this.secrets : undefined
    if (chain && !chain.canWrite()) {
      throw new SecretNotWritableError()
    }
    const target = fileChanges.length > 0 ? this.writeTarget(scopeId, fileChanges[0][0]) : undefined

    if (target) {
      const changed = this.applyToScope(target.scope, target.filePath, fileChanges)
      if (changed.length > 0) {
        log(`${this.providerId}: set ${changed.join(', ')} in ${target.scope.id} (${target.filePath})`)
      }
      for (const key of changed) {
        this.emitChange({ key, value: updates[key], scope: target.scope.id })
      }
    }

    if (chain) {
      for (const [key, stored] of secretChanges) {
        const provider = chain.set(stripSecretPrefix(key), stored)
        this.emitChange({ key, value: updates[key], scope: SECRETS_SCOPE, provider })
      }
    }
  }

  /**
   * Remove `key` from one scope; returns whether it was present there
   */
  clear(key: string, scopeId?: string): boolean {
    assertValidKey(key)

    const chain = this.secretsFor(key, scopeId)
    if (chain) {
      const removed = chain.delete(stripSecretPrefix(key))
      if (removed) {
        this.emitChange({ key, value: undefined, scope: SECRETS_SCOPE })
      }
      return removed
    }

    const target = this.writeTarget(scopeId, key)
    if (this.applyToScope(target.scope, target.filePath, [[key, undefined]]).length === 0) {
      return false
    }
    log(`${this.providerId}: cleared ${key} from ${target.scope.id} (${target.filePath})`)
    this.emitChange({ key, value: undefined, scope: target.scope.id })
    return true
  }

  /**
   * Subscribe to changes made through this engine; returns an unsubscribe
   * function. Writes by other processes are not reported.
   */
  onChange(listener: ChangeListener): () => void {
    this.events.on(CHANGE_EVENT, listener)
    return () => {
      this.events.off(CHANGE_EVENT, listener)
    }
  }

  /**
   * Hand a master passphrase to the secrets chain (omit it to use the
   * passphrase environment variable); returns the providers unlocked
   */
  unlockSecrets(passphrase?: string): string[] {
    return this.secrets ? this.secrets.unlock(passphrase) : []
  }

  /**
   * Run `fn` with `scopeId` as the write target for calls that name none.
   * The previous target is restored when `fn` returns or throws, and for
   * async work once its promise settles.
   */
  withWriteScope<T>(scopeId: string, fn: () => T): T {
    this.writableScope(scopeId)
    return this.writeScopeStore.run(scopeId, fn)
  }

  get defaultWriteScope(): string {
    return this.defaultWriteScopeId
  }

  setDefaultWriteScope(scopeId: string): void {
    this.writableScope(scopeId)
    this.defaultWriteScopeId = scopeId
  }

  /**
   * Write target used when set()/clear() are called without a scope
   */
  activeWriteScope(): string {
    return this.targetScopeId(undefined)
  }

  invalidateCache(): void {
    this.cache.clear()
    debug(`${this.providerId}: cache invalidated`)
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private lookupRaw(key: string): string | undefined {
    assertValidKey(key)

    if (isSecretKey(key) && this.secrets) {
      const secret = this.secrets.get(stripSecretPrefix(key))
      if (secret !== undefined) return secret
    }

    for (const scope of this.policy.scopes()) {
      const value = this.valueIn(scope, key)
      if (value !== undefined) return value
    }
    return undefined
  }

  /**
   * Raw value of `key` in one scope. Overlay entries also match by their
   * environment-name form.
   */
  private valueIn(scope: Scope, key: string): string | undefined {
    const mapping = this.loadScope(scope)
    const found = scope.kind === 'overlay' ? findOverlayKey(mapping, key) : key
    return found !== undefined && Object.hasOwn(mapping, found) ? mapping[found] : undefined
  }

  private loadScope(scope: Scope): Readonly<Mapping> {
    if (scope.kind === 'overlay') {
      return this.readOverlay(scope.id)
    }

    const cached = this.cache.get(scope.id)
    if (cached) return cached

    const filePath = this.policy.resolvePath(scope.id, this.context)
    const loaded: Mapping = filePath === null ? {} : this.loadFile(filePath)
    const mapping = scope.terminal ? { ...this.builtinDefaults, ...loaded } : loaded
    this.cache.set(scope.id, Object.freeze(mapping))
    return mapping
  }

  /**
   * Apply `changes` (undefined removes a key) to one file with a single
   * load-mutate-save; returns the keys whose stored value changed
   */
  private applyToScope(
    scope: Scope,
    filePath: string,
    changes: ReadonlyArray<readonly [string, string | undefined]>
  ): string[] {
    const current = this.loadFile(filePath)
    const next: Mapping = { ...current }
    const changed: string[] = []

    for (const [key, value] of changes) {
      if (value === undefined) {
        if (!Object.hasOwn(next, key)) continue
        delete next[key]
      } else {
        if (Object.hasOwn(next, key) && next[key] === value) continue
        next[key] = value
      }
      changed.push(key)
    }

    if (changed.length > 0) {
      this.registry.getBackendForPath(filePath).save(filePath, next)
    }
    this.cache.set(scope.id, Object.freeze(changed.length > 0 ? next : current))
    return changed
  }

  private emitChange(event: ChangeEvent): void {
    this.events.emit(CHANGE_EVENT, event)
  }

  /**
   * Chain that takes a write of `key`: only `secret.` keys with no scope named
   */
  private secretsFor(key: string, scopeId: string | undefined): SecretChain | undefined {
    return isSecretKey(key) && scopeId === undefined ? this.secrets : undefined
  }

  private writeTarget(scopeId: string | undefined, key: string): { scope: Scope; filePath: string } {
    const scope = this.writableScope(this.targetScopeId(scopeId), key)
    return { scope, filePath: this.writablePath(scope, key) }
  }

  private readOverlay(scopeId: string): Mapping {
    const reader = this.overlays.get(scopeId)
    if (!reader) {
      throw new InvalidPolicyError(`overlay scope "${scopeId}" has no reader`)
    }
    return reader(this.providerId)
  }

  /**
   * Load a file fresh; a missing file is an empty mapping
   */
  private loadFile(filePath: string): Mapping {
    const backend = this.registry.getBackendForPath(filePath)
    try {
      return backend.load(filePath)
    } catch (err) {
      if (err instanceof FileNotFoundError) {
        return {}
      }
      throw err
    }
  }

  private targetScopeId(explicit: string | undefined): string {
    return explicit ?? this.writeScopeStore.getStore() ?? this.defaultWriteScopeId
  }

  private writableScope(scopeId: string, key?: string): Scope {
    const scope = this.policy.getScope(scopeId)
    if (!scope.writable) {
      throw new NotWritableError(scopeId, key)
    }
    return scope
  }

  private writablePath(scope: Scope, key: string): string {
    const filePath = this.policy.resolvePath(scope.id, this.context)
    if (filePath === null) {
      throw new NotWritableError(scope.id, key)
    }
    return filePath
  }
}

// ============================================================================
// Factory
// ============================================================================

export interface CreateEngineOptions extends Omit<EngineOptions, 'providerId' | 'secrets'> {
  /** Directory holding config.yaml, dev-links/ and per-provider settings */
  configHome?: string
  /** Library configuration (default: loaded from configHome) */
  config?: SigilConfig
  env?: NodeJS.ProcessEnv
  /** Start directory for project root discovery */
  cwd?: string
  /** Custom chain, or false for none (default: keyring → vault → env) */
  secrets?: SecretChain | false
  /** Keyring backend factory for the default chain */
  keyring?: () => KeyringBackend
}

/**
 * Build an engine from the library configuration, discovery and the
 * default secrets chain
 */
export function createEngine(providerId: string, options: CreateEngineOptions = {}): SigilEngine {
  const env = options.env ?? process.env
  const id = normalizeProviderId(providerId)
  const configHome = options.configHome ?? options.userConfigDir ?? userConfigDir(env)
  const config = options.config ?? loadSigilConfig({ configHome, env })

  if (config.verbose) {
    setVerbose(true)
  }

  const cwd = path.resolve(options.cwd ?? process.cwd())
  const projectRoot = options.projectRoot ?? findProjectRoot(cwd, env) ?? cwd
  const settingsFilename = options.settingsFilename ?? config.settings_filename
  const policy = options.policy ??
    (config.policy === DEFAULT_POLICY_MODE ? defaultPolicy.get() : createDefaultPolicy(config.policy))

  const secrets = options.secrets === false
    ? undefined
    : options.secrets ?? createDefaultSecretChain(id, {
      vaultPath: defaultVaultPath(configHome, id),
      env,
      passphraseEnv: config.vault.passphrase_env,
      iterations: config.vault.iterations,
      keyring: options.keyring
    }).chain

  return new SigilEngine({
    providerId: id,
    policy,
    registry: options.registry,
    envReader: options.envReader ?? createEnvReader(env),
    overlays: options.overlays,
    secrets,
    defaultsPath: options.defaultsPath !== undefined
      ? options.defaultsPath
      : resolveDefaultsPath(id, { configHome, env, projectRoot, settingsFilename }),
    defaults: options.defaults,
    projectRoot,
    userConfigDir: configHome,
    host: options.host,
    settingsFilename,
    defaultWriteScope: options.defaultWriteScope ?? config.default_write_scope
  })
}
