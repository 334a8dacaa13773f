/**
 * Defaults discovery and dev-links
 *
 * An author working on a provider can point sigil at a checkout's defaults
 * file instead of the installed copy:
 *
 *   <configHome>/dev-links/<providerId>.link   (one absolute path)
 *
 * resolveDefaultsPath() checks the dev-link first, then the installed
 * package's `.sigil/<settings file>`. Finding nothing is not an error; the
 * defaults scope is simply empty.
 */

import fs from 'node:fs'
import path from 'node:path'
import { createRequire } from 'node:module'
import { globSync } from 'tinyglobby'
import { FileNotFoundError, isNotFound } from './errors.js'
import { writeFileAtomic } from './atomic-write.js'
import { debug, log, warn } from './logger.js'
import { userConfigDir } from './paths.js'
import { normalizeProviderId } from './provider-id.js'

export const DEV_LINKS_DIR = 'dev-links'
export const LINK_SUFFIX = '.link'
const PACKAGE_DEFAULTS_DIR = '.sigil'
const DEFAULT_SETTINGS_FILENAME = 'settings.ini'

export interface DevLinkOptions {
  /** Directory holding dev-links/ (default: the user config dir) */
  configHome?: string
  env?: NodeJS.ProcessEnv
}

export interface DevLink {
  providerId: string
  /** Linked defaults file */
  target: string
  /** The .link file itself */
  linkPath: string
}

export interface ResolveDefaultsOptions extends DevLinkOptions {
  /** Where installed packages are searched from (default: cwd) */
  projectRoot?: string
  settingsFilename?: string
}

export function devLinksDir(options: DevLinkOptions = {}): string {
  return path.join(options.configHome ?? userConfigDir(options.env), DEV_LINKS_DIR)
}

export function devLinkPath(providerId: string, options: DevLinkOptions = {}): string {
  return path.join(devLinksDir(options), `${normalizeProviderId(providerId)}${LINK_SUFFIX}`)
}

/**
 * Point a provider's defaults at `target` (must exist)
 */
export function linkDefaults(providerId: string, target: string, options: DevLinkOptions = {}): DevLink {
  const absoluteTarget = path.resolve(target)
  if (!fs.existsSync(absoluteTarget)) {
    throw new FileNotFoundError(absoluteTarget)
  }

  const id = normalizeProviderId(providerId)
  const linkPath = devLinkPath(id, options)
  writeFileAtomic(linkPath, `${absoluteTarget}\n`)
  log(`linked ${id} defaults → ${absoluteTarget}`)

  return { providerId: id, target: absoluteTarget, linkPath }
}

/**
 * Remove a dev-link; returns whether one existed
 */
export function unlinkDefaults(providerId: string, options: DevLinkOptions = {}): boolean {
  const linkPath = devLinkPath(providerId, options)
  try {
    fs.unlinkSync(linkPath)
  } catch (err) {
    if (isNotFound(err)) return false
    throw err
  }
  log(`removed dev-link ${linkPath}`)
  return true
}

/**
 * Target recorded in a provider's dev-link, or null when there is none
 */
export function readDevLink(providerId: string, options: DevLinkOptions = {}): string | null {
  let content: string
  try {
    content = fs.readFileSync(devLinkPath(providerId, options), 'utf-8')
  } catch (err) {
    if (isNotFound(err)) return null
    throw err
  }

  const target = content.trim()
  return target === '' ? null : target
}

export function listDevLinks(options: DevLinkOptions = {}): DevLink[] {
  const dir = devLinksDir(options)
  if (!fs.existsSync(dir)) return []

  const links: DevLink[] = []
  for (const linkPath of globSync(`*${LINK_SUFFIX}`, { cwd: dir, absolute: true })) {
    const providerId = path.basename(linkPath, LINK_SUFFIX)
    const target = fs.readFileSync(linkPath, 'utf-8').trim()
    if (target) {
      links.push({ providerId, target, linkPath: path.resolve(linkPath) })
    }
  }

  return links.sort((a, b) => a.providerId.localeCompare(b.providerId))
}

/**
 * Defaults file of an installed package, looked up through Node's module
 * search paths from `projectRoot`
 */
function findPackageDefaults(providerId: string, projectRoot: string, settingsFilename: string): string | null {
  const require = createRequire(path.join(path.resolve(projectRoot), 'package.json'))
  const searchPaths = require.resolve.paths(providerId) ?? []

  for (const nodeModules of searchPaths) {
    const candidate = path.join(nodeModules, providerId, PACKAGE_DEFAULTS_DIR, settingsFilename)
    if (fs.existsSync(candidate)) {
      return candidate
    }
  }
  return null
}

export function resolveDefaultsPath(providerId: string, options: ResolveDefaultsOptions = {}): string | null {
  const id = normalizeProviderId(providerId)
  const settingsFilename = options.settingsFilename ?? DEFAULT_SETTINGS_FILENAME

  const linked = readDevLink(id, options)
  if (linked !== null) {
    if (fs.existsSync(linked)) {
      debug(`defaults for ${id} from dev-link: ${linked}`)
      return linked
    }
    warn(`dev-link for ${id} points to a missing file: ${linked}`)
  }

  const installed = findPackageDefaults(id, options.projectRoot ?? process.cwd(), settingsFilename)
  if (installed) {
    debug(`defaults for ${id} from package: ${installed}`)
    return installed
  }

  debug(`no defaults found for ${id}`)
  return null
}
