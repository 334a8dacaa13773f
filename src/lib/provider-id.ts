import { InvalidProviderIdError } from './errors.js'

const SEPARATOR_RUN = /[-_.]+/g

/**
 * Normalise a package/application name into a provider id.
 *
 * Lowercases and collapses runs of `-`, `_` and `.` into a single `-`,
 * so `My_App.Core` and `my-app-core` name the same provider.
 */
export function normalizeProviderId(raw: string): string {
  const normalized = raw.trim().toLowerCase().replace(SEPARATOR_RUN, '-')
  if (!/[a-z0-9]/.test(normalized)) {
    throw new InvalidProviderIdError(raw)
  }
  return normalized
}
