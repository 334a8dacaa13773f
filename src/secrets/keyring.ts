/**
 * OS keyring provider
 *
 * Backed by @napi-rs/keyring, which is loaded on first use so hosts without
 * a usable keyring (headless CI, containers) only lose this provider. Any
 * failure while loading or calling the keyring is reported as
 * `unavailable`, letting the chain fall through to the next provider.
 */

import { createRequire } from 'node:module'
import type { SecretLookup, SecretProvider } from '../types.js'
import { KeyringUnavailableError, SecretsError } from '../lib/errors.js'

const require = createRequire(import.meta.url)

// Looked up once to check that the keyring service actually answers
const PROBE_ACCOUNT = '__sigil_probe__'

/**
 * Minimal keyring surface, so tests can supply a stand-in
 */
export interface KeyringBackend {
  getPassword(service: string, account: string): string | undefined
  setPassword(service: string, account: string, password: string): void
  deletePassword(service: string, account: string): boolean
}

export function loadNativeKeyring(): KeyringBackend {
  const native: typeof import('@napi-rs/keyring') = require('@napi-rs/keyring')

  return {
    getPassword: (service, account) => new native.Entry(service, account).getPassword() ?? undefined,
    setPassword: (service, account, password) => {
      new native.Entry(service, account).setPassword(password)
    },
    deletePassword: (service, account) => {
      const entry = new native.Entry(service, account)
      if (entry.getPassword() == null) return false
      entry.deletePassword()
      return true
    }
  }
}

export interface KeyringProviderOptions {
  /** Keyring service name (default `sigil:<providerId>`) */
  service?: string
  /** Backend factory, defaults to the native keyring */
  backend?: () => KeyringBackend
}

export class KeyringProvider implements SecretProvider {
  readonly name = 'keyring'
  readonly supportsWrite = true
  readonly service: string

  private readonly factory: () => KeyringBackend
  private backend: KeyringBackend | undefined
  private loadError: Error | undefined

  constructor(providerId: string, options: KeyringProviderOptions = {}) {
    this.service = options.service ?? `sigil:${providerId}`
    this.factory = options.backend ?? loadNativeKeyring
  }

  private resolveBackend(): KeyringBackend {
    if (this.backend) return this.backend
    if (this.loadError) throw this.loadError

    try {
      const backend = this.factory()
      backend.getPassword(this.service, PROBE_ACCOUNT)
      this.backend = backend
      return backend
    } catch (err) {
      this.loadError = new KeyringUnavailableError(err instanceof Error ? err.message : String(err), err)
      throw this.loadError
    }
  }

  available(): boolean {
    try {
      this.resolveBackend()
      return true
    } catch {
      return false
    }
  }

  get(key: string): SecretLookup {
    try {
      const value = this.resolveBackend().getPassword(this.service, key)
      return value === undefined ? { status: 'miss' } : { status: 'hit', value }
    } catch (err) {
      const error = err instanceof KeyringUnavailableError
        ? err
        : new KeyringUnavailableError(err instanceof Error ? err.message : String(err), err)
      return { status: 'unavailable', error }
    }
  }

  set(key: string, value: string): void {
    const backend = this.resolveBackend()
    try {
      backend.setPassword(this.service, key, value)
    } catch (err) {
      throw new SecretsError(`Failed to store "${key}" in the OS keyring`, 'KEYRING_WRITE_FAILED', { cause: err })
    }
  }

  delete(key: string): boolean {
    const backend = this.resolveBackend()
    try {
      return backend.deletePassword(this.service, key)
    } catch (err) {
      throw new SecretsError(`Failed to delete "${key}" from the OS keyring`, 'KEYRING_WRITE_FAILED', { cause: err })
    }
  }
}
