/**
 * Sigil Error Hierarchy
 *
 * Typed error classes for every failure the resolution engine, the backend
 * registry and the secrets chain can surface.
 *
 * Hierarchy:
 *   SigilError (base)
 *   ├── ConfigError (library configuration)
 *   │   └── InvalidConfigError
 *   ├── ScopeError (policy and scope usage)
 *   │   ├── UnknownScopeError
 *   │   ├── NotWritableError
 *   │   └── InvalidPolicyError
 *   ├── BackendError (storage backends)
 *   │   ├── FileNotFoundError
 *   │   ├── UnsupportedFormatError
 *   │   └── CorruptFileError
 *   ├── ValidationError (input validation)
 *   │   ├── CastError
 *   │   ├── InvalidKeyError
 *   │   └── InvalidProviderIdError
 *   └── SecretsError (secrets chain)
 *       ├── VaultLockedError
 *       ├── DecryptionError
 *       ├── SecretNotWritableError
 *       └── KeyringUnavailableError
 */

interface SigilErrorOptions {
  suggestion?: string
  context?: Record<string, unknown>
  cause?: unknown
}

/**
 * Base error class for all Sigil errors
 */
export class SigilError extends Error {
  /** Error code for programmatic handling */
  readonly code: string

  /** Suggestion for how to fix the error */
  readonly suggestion?: string

  /** Additional context/data about the error */
  readonly context?: Record<string, unknown>

  constructor(message: string, code: string, options?: SigilErrorOptions) {
    super(message, { cause: options?.cause })
    this.name = 'SigilError'
    this.code = code
    this.suggestion = options?.suggestion
    this.context = options?.context

    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }

  /**
   * Format error for CLI output
   */
  toCliOutput(): string {
    const lines = [`Error: ${this.message}`]
    if (this.suggestion) {
      lines.push(`  Suggestion: ${this.suggestion}`)
    }
    return lines.join('\n')
  }

  /**
   * Convert to JSON for logging/debugging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      suggestion: this.suggestion,
      context: this.context,
      stack: this.stack
    }
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

export class ConfigError extends SigilError {
  constructor(message: string, code: string, options?: SigilErrorOptions) {
    super(message, code, options)
    this.name = 'ConfigError'
  }
}

/**
 * Thrown when config.yaml has invalid content
 */
export class InvalidConfigError extends ConfigError {
  constructor(message: string, configPath?: string, cause?: unknown) {
    super(
      configPath ? `Invalid config in ${configPath}: ${message}` : `Invalid config: ${message}`,
      'INVALID_CONFIG',
      {
        suggestion: 'Check the syntax of your sigil config.yaml',
        context: configPath ? { configPath } : undefined,
        cause
      }
    )
    this.name = 'InvalidConfigError'
  }
}

// =============================================================================
// Scope Errors
// =============================================================================

export class ScopeError extends SigilError {
  constructor(message: string, code: string, options?: SigilErrorOptions) {
    super(message, code, options)
    this.name = 'ScopeError'
  }
}

/**
 * Thrown when a scope id is not part of the active policy
 */
export class UnknownScopeError extends ScopeError {
  constructor(scopeId: string, knownScopes: string[] = []) {
    super(
      `Unknown scope: "${scopeId}"`,
      'UNKNOWN_SCOPE',
      {
        suggestion: knownScopes.length > 0 ? `Known scopes: ${knownScopes.join(', ')}` : undefined,
        context: { scopeId, knownScopes }
      }
    )
    this.name = 'UnknownScopeError'
  }
}

/**
 * Thrown when a write targets a read-only scope
 */
export class NotWritableError extends ScopeError {
  constructor(scopeId: string, key?: string) {
    super(
      key ? `Cannot write "${key}": scope "${scopeId}" is read-only` : `Scope "${scopeId}" is read-only`,
      'NOT_WRITABLE',
      {
        suggestion: 'Target a writable scope such as "user" or "project"',
        context: { scopeId, key }
      }
    )
    this.name = 'NotWritableError'
  }
}

/**
 * Thrown when a scope policy violates its invariants
 */
export class InvalidPolicyError extends ScopeError {
  constructor(reason: string) {
    super(`Invalid scope policy: ${reason}`, 'INVALID_POLICY', {
      context: { reason }
    })
    this.name = 'InvalidPolicyError'
  }
}

// =============================================================================
// Backend Errors
// =============================================================================

export class BackendError extends SigilError {
  constructor(message: string, code: string, options?: SigilErrorOptions) {
    super(message, code, options)
    this.name = 'BackendError'
  }
}

/**
 * Thrown by backends when the file to load does not exist
 */
export class FileNotFoundError extends BackendError {
  constructor(filePath: string, cause?: unknown) {
    super(
      `File not found: ${filePath}`,
      'NOT_FOUND',
      {
        suggestion: 'Check if the file path is correct',
        context: { filePath },
        cause
      }
    )
    this.name = 'FileNotFoundError'
  }
}

/**
 * Thrown when no backend is registered for a file suffix
 */
export class UnsupportedFormatError extends BackendError {
  constructor(filePath: string, supported: string[]) {
    super(
      `No backend registered for ${filePath}`,
      'UNSUPPORTED_FORMAT',
      {
        suggestion: `Supported suffixes: ${supported.join(', ')}`,
        context: { filePath, supported }
      }
    )
    this.name = 'UnsupportedFormatError'
  }
}

/**
 * Thrown when an existing file cannot be parsed
 */
export class CorruptFileError extends BackendError {
  constructor(filePath: string, reason: string, cause?: unknown) {
    super(
      `Corrupt file ${filePath}: ${reason}`,
      'CORRUPT_FILE',
      {
        suggestion: 'Fix or remove the file; it is never treated as empty',
        context: { filePath, reason },
        cause
      }
    )
    this.name = 'CorruptFileError'
  }
}

// =============================================================================
// Validation Errors
// =============================================================================

export class ValidationError extends SigilError {
  constructor(message: string, code: string, options?: SigilErrorOptions) {
    super(message, code, options)
    this.name = 'ValidationError'
  }
}

/**
 * Thrown when an explicit cast rejects a stored value
 */
export class CastError extends ValidationError {
  readonly key: string
  readonly value: string

  constructor(key: string, value: string, reason: string, cause?: unknown) {
    super(
      `Cannot cast "${key}" (value "${value}"): ${reason}`,
      'CAST_ERROR',
      {
        context: { key, value },
        cause
      }
    )
    this.name = 'CastError'
    this.key = key
    this.value = value
  }
}

/**
 * Thrown when a setting key is malformed
 */
export class InvalidKeyError extends ValidationError {
  constructor(key: string) {
    super(
      `Invalid setting key: "${key}"`,
      'INVALID_KEY',
      {
        suggestion: 'Keys are dot-separated segments of letters, digits, "_" and "-"',
        context: { key }
      }
    )
    this.name = 'InvalidKeyError'
  }
}

export class InvalidProviderIdError extends ValidationError {
  constructor(providerId: string) {
    super(`Invalid provider id: "${providerId}"`, 'INVALID_PROVIDER_ID', {
      suggestion: 'Provider ids must contain at least one letter or digit',
      context: { providerId }
    })
    this.name = 'InvalidProviderIdError'
  }
}

// =============================================================================
// Secrets Errors
// =============================================================================

export class SecretsError extends SigilError {
  constructor(message: string, code: string, options?: SigilErrorOptions) {
    super(message, code, options)
    this.name = 'SecretsError'
  }
}

/**
 * Thrown when the vault is used before it is unlocked
 */
export class VaultLockedError extends SecretsError {
  constructor(vaultPath?: string, passphraseEnv: string = 'SIGIL_MASTER_PWD') {
    super(
      'Vault is locked',
      'VAULT_LOCKED',
      {
        suggestion: `Unlock the vault with its master passphrase or set ${passphraseEnv}`,
        context: { vaultPath, passphraseEnv }
      }
    )
    this.name = 'VaultLockedError'
  }
}

/**
 * Thrown when decryption fails
 */
export class DecryptionError extends SecretsError {
  constructor(reason: string, cause?: unknown) {
    super(
      `Decryption failed: ${reason}`,
      'DECRYPTION_FAILED',
      {
        suggestion: 'Ensure you are using the correct master passphrase',
        cause
      }
    )
    this.name = 'DecryptionError'
  }
}

export class SecretNotWritableError extends SecretsError {
  constructor(providerName?: string) {
    super(
      providerName
        ? `Secret provider "${providerName}" is read-only or unavailable`
        : 'No write-capable secret provider is available',
      'SECRET_NOT_WRITABLE',
      {
        suggestion: 'Unlock the vault or make the OS keyring available',
        context: providerName ? { providerName } : undefined
      }
    )
    this.name = 'SecretNotWritableError'
  }
}

export class KeyringUnavailableError extends SecretsError {
  constructor(reason: string, cause?: unknown) {
    super(`OS keyring unavailable: ${reason}`, 'KEYRING_UNAVAILABLE', { cause })
    this.name = 'KeyringUnavailableError'
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isSigilError(error: unknown): error is SigilError {
  return error instanceof SigilError
}

export function isScopeError(error: unknown): error is ScopeError {
  return error instanceof ScopeError
}

export function isBackendError(error: unknown): error is BackendError {
  return error instanceof BackendError
}

export function isSecretsError(error: unknown): error is SecretsError {
  return error instanceof SecretsError
}

/**
 * Check whether an error signals a missing file (ours or the OS's)
 */
export function isNotFound(error: unknown): boolean {
  if (error instanceof FileNotFoundError) return true
  return error instanceof Error && 'code' in error && (error.code === 'ENOENT' || error.code === 'ENOTDIR')
}

// =============================================================================
// Error Formatting Helpers
// =============================================================================

/**
 * Format any error for CLI output
 */
export function formatErrorForCli(error: unknown): string {
  if (isSigilError(error)) {
    return error.toCliOutput()
  }
  if (error instanceof Error) {
    return `Error: ${error.message}`
  }
  return `Error: ${String(error)}`
}

/**
 * Wrap a generic error into a SigilError if needed
 */
export function wrapError(error: unknown, defaultCode: string = 'UNKNOWN_ERROR'): SigilError {
  if (isSigilError(error)) {
    return error
  }
  if (error instanceof Error) {
    return new SigilError(error.message, defaultCode, { cause: error })
  }
  return new SigilError(String(error), defaultCode)
}
