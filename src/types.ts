/**
 * Sigil - Type Definitions
 */

// ============================================================================
// Mappings & Values
// ============================================================================

/**
 * Flat mapping of dotted keys (`db.host`) to raw stored strings.
 * Keys are case-sensitive.
 */
export type Mapping = Record<string, string>

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue }

/** A value as returned by auto-casting, or accepted by `set` */
export type SettingValue = string | number | boolean | JsonValue[] | { [key: string]: JsonValue }

/** Explicit conversion applied to a raw stored string */
export type Caster<T> = (raw: string) => T

/**
 * Emitted after a write changed a stored value
 */
export interface ChangeEvent {
  key: string
  /** New value, or undefined when the key was cleared */
  value: SettingValue | undefined
  /** Scope id written, or `secrets` for the secrets chain */
  scope: string
  /** Secret provider that took a `secret.` write */
  provider?: string
}

export type ChangeListener = (event: ChangeEvent) => void

// ============================================================================
// Backends
// ============================================================================

export interface Backend {
  /** Short format name, for messages */
  readonly name: string
  /** Throws FileNotFoundError when the file is absent, CorruptFileError when unparsable */
  load(filePath: string): Mapping
  /** Must replace the file atomically */
  save(filePath: string, mapping: Mapping): void
}

// ============================================================================
// Scopes & Policy
// ============================================================================

export type ScopeKind = 'file' | 'overlay'

/** Which of user/project wins in the built-in policy */
export type PolicyMode = 'project_over_user' | 'user_over_project'

/**
 * Everything a scope needs to resolve its file
 */
export interface ScopeContext {
  providerId: string
  host: string
  userConfigDir: string
  projectRoot: string
  /** Resolved defaults file, or null when discovery found none */
  defaultsPath: string | null
  settingsFilename: string
}

export type ScopeResolver = (ctx: ScopeContext) => string | null

export interface Scope {
  readonly id: string
  readonly writable: boolean
  /** File name is suffixed with the host id when resolved */
  readonly machineAffinity: boolean
  readonly kind: ScopeKind
  /** The always-present, read-only defaults scope */
  readonly terminal: boolean
  readonly resolve: ScopeResolver
}

export interface ScopeInput {
  id: string
  writable?: boolean
  machineAffinity?: boolean
  kind?: ScopeKind
  terminal?: boolean
  resolve?: ScopeResolver
}

/** Synthesizes the mapping of an overlay scope for a provider */
export type OverlayReader = (providerId: string) => Mapping

// ============================================================================
// Secrets
// ============================================================================

export type SecretLookup =
  | { status: 'hit'; value: string }
  | { status: 'miss' }
  | { status: 'unavailable'; error: Error }

export interface SecretProvider {
  readonly name: string
  readonly supportsWrite: boolean
  /** Whether the provider can currently serve requests */
  available(): boolean
  get(key: string): SecretLookup
  set(key: string, value: string): void
  /** Returns whether something was removed */
  delete(key: string): boolean
  /** Providers behind a master passphrase take it here */
  unlock?(passphrase?: string): void
}

export type VaultState = 'locked' | 'unlocked'

/**
 * On-disk vault envelope (base64 fields)
 */
export interface VaultEnvelope {
  v: 1
  kdf: 'pbkdf2-sha256'
  iterations: number
  salt: string
  iv: string
  data: string
  tag: string
}

// ============================================================================
// Configuration
// ============================================================================

/**
 * Library settings, loaded from `<configHome>/config.yaml`
 */
export interface SigilConfig {
  policy: PolicyMode
  settings_filename: string
  default_write_scope: string
  verbose: boolean
  vault: {
    passphrase_env: string
    iterations?: number
  }
}
