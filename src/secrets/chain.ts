/**
 * Secrets provider chain
 *
 * Reads scan providers in order and return the first hit; misses and
 * unavailable providers are skipped. Writes go to a pinned provider or to
 * the first provider that supports writes and is currently available.
 */

import type { SecretProvider } from '../types.js'
import { SecretNotWritableError, SecretsError } from '../lib/errors.js'
import { debug } from '../lib/logger.js'

export interface SecretTargetOptions {
  /** Provider name to use instead of the first writable one */
  provider?: string
}

export class SecretChain {
  private readonly ordered: readonly SecretProvider[]

  constructor(providers: Iterable<SecretProvider>) {
    this.ordered = Object.freeze([...providers])
  }

  providers(): readonly SecretProvider[] {
    return this.ordered
  }

  provider(name: string): SecretProvider {
    const found = this.ordered.find(p => p.name === name)
    if (!found) {
      throw new SecretsError(`Unknown secret provider: "${name}"`, 'UNKNOWN_SECRET_PROVIDER', {
        suggestion: `Known providers: ${this.ordered.map(p => p.name).join(', ')}`,
        context: { name }
      })
    }
    return found
  }

  get(key: string): string | undefined {
    for (const provider of this.ordered) {
      const result = provider.get(key)
      if (result.status === 'hit') {
        return result.value
      }
      if (result.status === 'unavailable') {
        debug(`secret provider ${provider.name} unavailable: ${result.error.message}`)
      }
    }
    debug(`secret ${key} not found`)
    return undefined
  }

  /**
   * Read from one provider only; its unavailability is surfaced as an error
   */
  getFrom(providerName: string, key: string): string | undefined {
    const result = this.provider(providerName).get(key)
    if (result.status === 'unavailable') {
      throw result.error
    }
    return result.status === 'hit' ? result.value : undefined
  }

  /**
   * Unlock every provider that takes a passphrase; returns their names.
   * A wrong passphrase throws and leaves the provider locked.
   */
  unlock(passphrase?: string): string[] {
    const unlocked: string[] = []
    for (const provider of this.ordered) {
      if (!provider.unlock) continue
      provider.unlock(passphrase)
      unlocked.push(provider.name)
    }
    return unlocked
  }

  canWrite(): boolean {
    return this.ordered.some(p => p.supportsWrite && p.available())
  }

  set(key: string, value: string, options: SecretTargetOptions = {}): string {
    const target = this.writeTarget(options)
    target.set(key, value)
    return target.name
  }

  delete(key: string, options: SecretTargetOptions = {}): boolean {
    return this.writeTarget(options).delete(key)
  }

  private writeTarget(options: SecretTargetOptions): SecretProvider {
    if (options.provider !== undefined) {
      const pinned = this.provider(options.provider)
      if (!pinned.supportsWrite) {
        throw new SecretNotWritableError(pinned.name)
      }
      return pinned
    }

    const target = this.ordered.find(p => p.supportsWrite && p.available())
    if (!target) {
      throw new SecretNotWritableError()
    }
    return target
  }
}
