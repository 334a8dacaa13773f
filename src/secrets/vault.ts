/**
 * Encrypted file vault
 *
 * States: `locked` (initial) → `unlocked` (after a valid master passphrase).
 * There is no re-lock; the vault stays unlocked for the life of the process.
 *
 * The passphrase comes from `unlock(passphrase)` or, when it is set, from
 * the SIGIL_MASTER_PWD environment variable on first use. The key is
 * derived once per salt; every read decrypts the file afresh so writes by
 * other processes are seen. Every write (including rotation) replaces the
 * file atomically.
 */

import fs from 'node:fs'
import path from 'node:path'
import type { Mapping, SecretLookup, SecretProvider, VaultEnvelope, VaultState } from '../types.js'
import {
  CorruptFileError,
  DecryptionError,
  VaultLockedError,
  isNotFound
} from '../lib/errors.js'
import { writeFileAtomic } from '../lib/atomic-write.js'
import {
  DEFAULT_KDF_ITERATIONS,
  decryptMapping,
  deriveKey,
  encryptMapping,
  generateSalt,
  parseEnvelope,
  sameKey,
  serializeEnvelope,
  type DerivedKey
} from '../lib/crypto.js'
import { debug, log, warn } from '../lib/logger.js'

export const DEFAULT_PASSPHRASE_ENV = 'SIGIL_MASTER_PWD'
export const VAULT_FILENAME = 'settings.enc.json'
const VAULT_FILE_MODE = 0o600

/**
 * Vault file beside the provider's user settings
 */
export function defaultVaultPath(userConfigDir: string, providerId: string): string {
  return path.join(userConfigDir, providerId, VAULT_FILENAME)
}

export interface VaultProviderOptions {
  /** Vault file location */
  path: string
  /** Environment variable holding the master passphrase */
  passphraseEnv?: string
  /** PBKDF2 iterations for newly created salts */
  iterations?: number
  env?: NodeJS.ProcessEnv
}

export class VaultProvider implements SecretProvider {
  readonly name = 'vault'
  readonly supportsWrite = true
  readonly path: string

  private readonly passphraseEnv: string
  private readonly iterations: number
  private readonly env: NodeJS.ProcessEnv
  private passphrase: string | undefined
  private derived: DerivedKey | undefined
  // Env passphrase that already failed, so it is not derived again
  private rejectedEnv: { passphrase: string; error: DecryptionError } | undefined

  constructor(options: VaultProviderOptions) {
    this.path = options.path
    this.passphraseEnv = options.passphraseEnv ?? DEFAULT_PASSPHRASE_ENV
    this.iterations = options.iterations ?? DEFAULT_KDF_ITERATIONS
    this.env = options.env ?? process.env
  }

  get state(): VaultState {
    return this.derived ? 'unlocked' : 'locked'
  }

  exists(): boolean {
    return fs.existsSync(this.path)
  }

  /**
   * Unlock with `passphrase`, or with the passphrase environment variable.
   * Repeating with the same passphrase is a no-op.
   */
  unlock(passphrase?: string): void {
    const candidate = passphrase ?? this.env[this.passphraseEnv]
    if (candidate === undefined || candidate === '') {
      throw new VaultLockedError(this.path, this.passphraseEnv)
    }

    if (this.derived) {
      const check = deriveKey(candidate, this.derived.salt, this.derived.iterations)
      if (!sameKey(check.key, this.derived.key)) {
        throw new DecryptionError('vault is already unlocked with a different passphrase')
      }
      return
    }

    const envelope = this.readEnvelope()
    if (envelope) {
      const derived = deriveKey(candidate, Buffer.from(envelope.salt, 'base64'), envelope.iterations)
      // Throws DecryptionError on a wrong passphrase; the vault stays locked
      decryptMapping(envelope, derived.key)
      this.derived = derived
    } else {
      this.derived = deriveKey(candidate, generateSalt(), this.iterations)
    }

    this.passphrase = candidate
    log(`vault unlocked: ${this.path}`)
  }

  available(): boolean {
    try {
      this.ensureUnlocked()
      return true
    } catch (err) {
      if (!(err instanceof VaultLockedError) && !(err instanceof DecryptionError)) {
        warn(`vault unavailable: ${err instanceof Error ? err.message : String(err)}`)
      }
      return false
    }
  }

  get(key: string): SecretLookup {
    try {
      this.ensureUnlocked()
    } catch (err) {
      if (err instanceof VaultLockedError || err instanceof DecryptionError) {
        return { status: 'unavailable', error: err }
      }
      throw err
    }

    const data = this.readAll()
    return Object.hasOwn(data, key) ? { status: 'hit', value: data[key] } : { status: 'miss' }
  }

  set(key: string, value: string): void {
    this.ensureUnlocked()
    const data = this.readAll()
    data[key] = value
    this.writeAll(data)
  }

  delete(key: string): boolean {
    this.ensureUnlocked()
    const data = this.readAll()
    if (!Object.hasOwn(data, key)) return false
    delete data[key]
    this.writeAll(data)
    return true
  }

  keys(): string[] {
    this.ensureUnlocked()
    return Object.keys(this.readAll()).sort()
  }

  /**
   * Re-encrypt the whole vault under a new passphrase and salt
   */
  rotate(newPassphrase: string): void {
    this.ensureUnlocked()
    if (!newPassphrase) {
      throw new DecryptionError('new passphrase must not be empty')
    }

    const data = this.readAll()
    const next = deriveKey(newPassphrase, generateSalt(), this.iterations)
    this.writeEnvelope(encryptMapping(data, next))

    this.derived = next
    this.passphrase = newPassphrase
    log(`vault key rotated: ${this.path}`)
  }

  private ensureUnlocked(): DerivedKey {
    const fromEnv = this.env[this.passphraseEnv]
    if (!this.derived && fromEnv) {
      if (this.rejectedEnv?.passphrase === fromEnv) {
        throw this.rejectedEnv.error
      }
      debug(`unlocking vault from ${this.passphraseEnv}`)
      try {
        this.unlock(fromEnv)
      } catch (err) {
        if (err instanceof DecryptionError) {
          this.rejectedEnv = { passphrase: fromEnv, error: err }
          warn(`vault unavailable: ${this.passphraseEnv} does not unlock ${this.path}`)
        }
        throw err
      }
    }
    if (!this.derived) {
      throw new VaultLockedError(this.path, this.passphraseEnv)
    }
    return this.derived
  }

  private readEnvelope(): VaultEnvelope | null {
    let content: string
    try {
      content = fs.readFileSync(this.path, 'utf-8')
    } catch (err) {
      if (isNotFound(err)) return null
      throw err
    }

    try {
      return parseEnvelope(content)
    } catch (err) {
      throw new CorruptFileError(this.path, err instanceof Error ? err.message : String(err), err)
    }
  }

  /**
   * Key for an envelope; re-derived when another process rotated the salt
   */
  private keyFor(envelope: VaultEnvelope): Buffer {
    const current = this.ensureUnlocked()
    if (envelope.salt === current.salt.toString('base64') && envelope.iterations === current.iterations) {
      return current.key
    }
    if (this.passphrase === undefined) {
      throw new VaultLockedError(this.path, this.passphraseEnv)
    }
    const derived = deriveKey(this.passphrase, Buffer.from(envelope.salt, 'base64'), envelope.iterations)
    this.derived = derived
    return derived.key
  }

  private readAll(): Mapping {
    const envelope = this.readEnvelope()
    if (!envelope) return {}
    return decryptMapping(envelope, this.keyFor(envelope))
  }

  private writeAll(data: Mapping): void {
    this.writeEnvelope(encryptMapping(data, this.ensureUnlocked()))
  }

  private writeEnvelope(envelope: VaultEnvelope): void {
    writeFileAtomic(this.path, serializeEnvelope(envelope), { mode: VAULT_FILE_MODE })
  }
}
