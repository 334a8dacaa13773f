import type { SecretLookup, SecretProvider } from '../types.js'
import { SecretNotWritableError } from '../lib/errors.js'
import { envVarName } from '../lib/env-overlay.js'

export const SECRET_ENV_PREFIX = 'SIGIL_SECRET_'

/**
 * Read-only secrets from `SIGIL_SECRET_<PROVIDER>_<KEY>`, meant for CI
 */
export class EnvSecretProvider implements SecretProvider {
  readonly name = 'env'
  readonly supportsWrite = false

  constructor(
    private readonly providerId: string,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  variableFor(key: string): string {
    return envVarName(this.providerId, key, SECRET_ENV_PREFIX)
  }

  available(): boolean {
    return true
  }

  get(key: string): SecretLookup {
    const value = this.env[this.variableFor(key)]
    return value === undefined ? { status: 'miss' } : { status: 'hit', value }
  }

  set(): void {
    throw new SecretNotWritableError(this.name)
  }

  delete(): boolean {
    throw new SecretNotWritableError(this.name)
  }
}
