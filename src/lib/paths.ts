/**
 * Filesystem locations: user config directory, project root, host id
 */

import fs from 'node:fs'
import os from 'node:os'
import path from 'node:path'

const APP_DIR = 'sigil'
const PROJECT_DIR = '.sigil'
const SENTINEL_FILE = '.sigil-root'
const MAX_SEARCH_DEPTH = 10

// Checked in order at every level while walking up
const ROOT_MARKERS = [SENTINEL_FILE, PROJECT_DIR, '.git', 'package.json', 'pyproject.toml']

/**
 * Base directory for user-level sigil files.
 *
 * SIGIL_CONFIG_HOME wins; otherwise the platform's per-user config
 * location is used.
 */
export function userConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  if (env.SIGIL_CONFIG_HOME) {
    return path.resolve(env.SIGIL_CONFIG_HOME)
  }

  const home = os.homedir()

  if (process.platform === 'win32') {
    return path.join(env.APPDATA || path.join(home, 'AppData', 'Roaming'), APP_DIR)
  }
  if (process.platform === 'darwin') {
    return path.join(home, 'Library', 'Application Support', APP_DIR)
  }
  return path.join(env.XDG_CONFIG_HOME || path.join(home, '.config'), APP_DIR)
}

/**
 * Find the project root by searching up from `startDir`.
 * SIGIL_ROOT short-circuits the search.
 */
export function findProjectRoot(
  startDir: string = process.cwd(),
  env: NodeJS.ProcessEnv = process.env
): string | null {
  if (env.SIGIL_ROOT) {
    return path.resolve(env.SIGIL_ROOT)
  }

  let currentDir = path.resolve(startDir)
  let depth = 0

  while (depth < MAX_SEARCH_DEPTH) {
    if (ROOT_MARKERS.some(marker => fs.existsSync(path.join(currentDir, marker)))) {
      return currentDir
    }

    const parentDir = path.dirname(currentDir)
    if (parentDir === currentDir) {
      // Reached root
      break
    }

    currentDir = parentDir
    depth++
  }

  return null
}

export function projectConfigDir(projectRoot: string): string {
  return path.join(projectRoot, PROJECT_DIR)
}

/**
 * Normalised host name used in machine-specific file names
 */
export function hostId(hostname: string = os.hostname()): string {
  const normalized = hostname
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
  return normalized || 'localhost'
}
