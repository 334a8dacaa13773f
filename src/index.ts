/**
 * Sigil - scope-precedence configuration resolution
 *
 * Main library exports for programmatic usage
 */

// Engine
export {
  SigilEngine,
  createEngine,
  SECRETS_SCOPE,
  type EngineOptions,
  type CreateEngineOptions,
  type GetOptions,
  type ExportEnvOptions
} from './engine.js'

// Types
export type {
  Mapping,
  JsonValue,
  SettingValue,
  Caster,
  ChangeEvent,
  ChangeListener,
  Backend,
  ScopeKind,
  PolicyMode,
  ScopeContext,
  ScopeResolver,
  Scope,
  ScopeInput,
  OverlayReader,
  SecretLookup,
  SecretProvider,
  VaultState,
  VaultEnvelope,
  SigilConfig
} from './types.js'

// Backends
export {
  BackendRegistry,
  createDefaultRegistry,
  defaultRegistry,
  registerBackend,
  getBackendForPath,
  listBackendSuffixes,
  iniBackend,
  jsonBackend,
  yamlBackend,
  envFileBackend,
  parseIni,
  serializeIni,
  serializeEnvFile
} from './backends/index.js'

// Scope policy
export {
  ScopePolicy,
  PolicyHandle,
  BUILTIN_SCOPES,
  ENV_SCOPE,
  DEFAULT_SCOPE,
  DEFAULT_POLICY_MODE,
  defineScope,
  applyHostSuffix,
  parsePolicyMode,
  createDefaultPolicy,
  defaultPolicy,
  type WithScopesOptions
} from './lib/scope-policy.js'

// Casting
export {
  AUTO_CAST_CHAIN,
  autoCast,
  applyCast,
  casts,
  stringifyValue,
  type CastResult,
  type ParseAttempt
} from './lib/cast.js'

// Environment overlay
export { ENV_PREFIX, readEnv, createEnvReader, envVarName, findOverlayKey } from './lib/env-overlay.js'

// Secrets
export {
  SecretChain,
  KeyringProvider,
  VaultProvider,
  EnvSecretProvider,
  createDefaultSecretChain,
  defaultVaultPath,
  SECRET_ENV_PREFIX,
  DEFAULT_PASSPHRASE_ENV,
  type KeyringBackend,
  type SecretTargetOptions,
  type DefaultSecretChainOptions
} from './secrets/index.js'

// Discovery
export {
  resolveDefaultsPath,
  linkDefaults,
  unlinkDefaults,
  readDevLink,
  listDevLinks,
  type DevLink,
  type DevLinkOptions,
  type ResolveDefaultsOptions
} from './lib/dev-links.js'

// Config & paths
export { loadSigilConfig, DEFAULT_CONFIG, type LoadConfigOptions } from './lib/config-loader.js'
export { userConfigDir, findProjectRoot, hostId } from './lib/paths.js'
export { normalizeProviderId } from './lib/provider-id.js'
export { isValidKey, splitKey, SECRET_PREFIX } from './lib/setting-keys.js'
export { writeFileAtomic } from './lib/atomic-write.js'
export { setVerbose, setSilent } from './lib/logger.js'

// Errors
export * from './lib/errors.js'
