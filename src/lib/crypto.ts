/**
 * Sigil Vault Crypto
 *
 * Passphrase-based symmetric encryption for the secrets vault.
 *
 * Flow:
 * 1. Derive a 256-bit key from the master passphrase (PBKDF2-SHA256, random salt)
 * 2. Encrypt the JSON-serialised mapping with AES-256-GCM (random 12-byte IV)
 * 3. Package salt, IV, ciphertext and auth tag as a VaultEnvelope
 */

import crypto from 'node:crypto'
import type { Mapping, VaultEnvelope } from '../types.js'
import { DecryptionError } from './errors.js'

export const DEFAULT_KDF_ITERATIONS = 100000
const KEY_BYTES = 32
const SALT_BYTES = 16
const IV_BYTES = 12

export interface DerivedKey {
  key: Buffer
  salt: Buffer
  iterations: number
}

export function generateSalt(): Buffer {
  return crypto.randomBytes(SALT_BYTES)
}

export function deriveKey(
  passphrase: string,
  salt: Buffer = generateSalt(),
  iterations: number = DEFAULT_KDF_ITERATIONS
): DerivedKey {
  const key = crypto.pbkdf2Sync(passphrase, salt, iterations, KEY_BYTES, 'sha256')
  return { key, salt, iterations }
}

/**
 * Constant-time comparison of two derived keys
 */
export function sameKey(a: Buffer, b: Buffer): boolean {
  return a.length === b.length && crypto.timingSafeEqual(a, b)
}

export function encryptMapping(mapping: Mapping, derived: DerivedKey): VaultEnvelope {
  const iv = crypto.randomBytes(IV_BYTES)
  const cipher = crypto.createCipheriv('aes-256-gcm', derived.key, iv)
  const encryptedData = Buffer.concat([
    cipher.update(JSON.stringify(mapping), 'utf8'),
    cipher.final()
  ])

  return {
    v: 1,
    kdf: 'pbkdf2-sha256',
    iterations: derived.iterations,
    salt: derived.salt.toString('base64'),
    iv: iv.toString('base64'),
    data: encryptedData.toString('base64'),
    tag: cipher.getAuthTag().toString('base64')
  }
}

/**
 * Decrypt an envelope. A wrong key and a tampered file both surface as
 * DecryptionError, since GCM cannot tell them apart.
 */
export function decryptMapping(envelope: VaultEnvelope, key: Buffer): Mapping {
  let plaintext: string
  try {
    const decipher = crypto.createDecipheriv('aes-256-gcm', key, Buffer.from(envelope.iv, 'base64'))
    decipher.setAuthTag(Buffer.from(envelope.tag, 'base64'))
    plaintext = Buffer.concat([
      decipher.update(Buffer.from(envelope.data, 'base64')),
      decipher.final()
    ]).toString('utf8')
  } catch (err) {
    throw new DecryptionError('wrong passphrase or tampered vault', err)
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(plaintext)
  } catch (err) {
    throw new DecryptionError('vault payload is not valid JSON', err)
  }
  if (!isStringMapping(parsed)) {
    throw new DecryptionError('vault payload is not a string mapping')
  }
  return parsed
}

function isStringMapping(value: unknown): value is Mapping {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false
  return Object.values(value).every(item => typeof item === 'string')
}

/**
 * Check if data is a vault envelope
 */
export function isVaultEnvelope(data: unknown): data is VaultEnvelope {
  if (typeof data !== 'object' || data === null) return false
  const obj = data as Record<string, unknown>
  return (
    obj.v === 1 &&
    obj.kdf === 'pbkdf2-sha256' &&
    typeof obj.iterations === 'number' &&
    typeof obj.salt === 'string' &&
    typeof obj.iv === 'string' &&
    typeof obj.data === 'string' &&
    typeof obj.tag === 'string'
  )
}

export function serializeEnvelope(envelope: VaultEnvelope): string {
  return `${JSON.stringify(envelope, null, 2)}\n`
}

/**
 * Parse a serialised envelope; throws on malformed input
 */
export function parseEnvelope(serialized: string): VaultEnvelope {
  const parsed: unknown = JSON.parse(serialized)
  if (!isVaultEnvelope(parsed)) {
    throw new Error('Invalid vault envelope format')
  }
  return parsed
}
