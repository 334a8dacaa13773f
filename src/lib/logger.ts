/**
 * Console logging helpers
 *
 * Everything is prefixed with `[sigil]`. Informational and debug output only
 * appears when verbose mode is on (SIGIL_VERBOSE=1|true or setVerbose(true)).
 */

let verboseOverride: boolean | undefined
let silent = false

function isVerbose(): boolean {
  if (verboseOverride !== undefined) return verboseOverride
  const raw = process.env.SIGIL_VERBOSE
  return raw === '1' || raw === 'true'
}

export function setVerbose(value: boolean | undefined): void {
  verboseOverride = value
}

export function setSilent(value: boolean): void {
  silent = value
}

export function log(message: string): void {
  if (!silent && isVerbose()) {
    console.log(`[sigil] ${message}`)
  }
}

export function debug(message: string): void {
  if (!silent && isVerbose()) {
    console.debug(`[sigil] DEBUG: ${message}`)
  }
}

export function warn(message: string): void {
  if (!silent) {
    console.warn(`[sigil] WARN: ${message}`)
  }
}

export function error(message: string): void {
  if (!silent) {
    console.error(`[sigil] ERROR: ${message}`)
  }
}
