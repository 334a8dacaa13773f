/**
 * Secrets chain: OS keyring → encrypted vault → environment
 */

import { SecretChain } from './chain.js'
import { EnvSecretProvider } from './env.js'
import { KeyringProvider, type KeyringBackend } from './keyring.js'
import { VaultProvider } from './vault.js'

export { SecretChain, type SecretTargetOptions } from './chain.js'
export { EnvSecretProvider, SECRET_ENV_PREFIX } from './env.js'
export {
  KeyringProvider,
  loadNativeKeyring,
  type KeyringBackend,
  type KeyringProviderOptions
} from './keyring.js'
export {
  VaultProvider,
  DEFAULT_PASSPHRASE_ENV,
  VAULT_FILENAME,
  defaultVaultPath,
  type VaultProviderOptions
} from './vault.js'

export interface DefaultSecretChainOptions {
  /** Vault file location */
  vaultPath: string
  env?: NodeJS.ProcessEnv
  passphraseEnv?: string
  iterations?: number
  /** Keyring backend factory, defaults to the native keyring */
  keyring?: () => KeyringBackend
}

export interface DefaultSecretChain {
  chain: SecretChain
  keyring: KeyringProvider
  vault: VaultProvider
  env: EnvSecretProvider
}

export function createDefaultSecretChain(
  providerId: string,
  options: DefaultSecretChainOptions
): DefaultSecretChain {
  const env = options.env ?? process.env
  const keyring = new KeyringProvider(providerId, { backend: options.keyring })
  const vault = new VaultProvider({
    path: options.vaultPath,
    passphraseEnv: options.passphraseEnv,
    iterations: options.iterations,
    env
  })
  const envProvider = new EnvSecretProvider(providerId, env)

  return {
    chain: new SecretChain([keyring, vault, envProvider]),
    keyring,
    vault,
    env: envProvider
  }
}
