/**
 * Atomic file replacement
 *
 * Content is written to a temp file in the target's directory, flushed to
 * disk and renamed over the target. Readers see either the old or the new
 * file, and a crash before the rename leaves the old file untouched.
 */

import fs from 'node:fs'
import path from 'node:path'
import crypto from 'node:crypto'

export interface AtomicWriteOptions {
  /** File mode for the written file (default 0o644) */
  mode?: number
}

/**
 * Name of a temp file beside `target`, unique per process and call
 */
export function tempPathFor(target: string): string {
  const dir = path.dirname(target)
  const base = path.basename(target)
  const suffix = `${process.pid}.${crypto.randomBytes(4).toString('hex')}`
  return path.join(dir, `.${base}.${suffix}.tmp`)
}

export function writeFileAtomic(
  target: string,
  content: string | Buffer,
  options: AtomicWriteOptions = {}
): void {
  fs.mkdirSync(path.dirname(target), { recursive: true })

  const tmp = tempPathFor(target)
  let fd: number | undefined

  try {
    fd = fs.openSync(tmp, 'w', options.mode ?? 0o644)
    fs.writeFileSync(fd, content)
    fs.fsyncSync(fd)
    fs.closeSync(fd)
    fd = undefined
    fs.renameSync(tmp, target)
  } catch (err) {
    if (fd !== undefined) {
      fs.closeSync(fd)
    }
    fs.rmSync(tmp, { force: true })
    throw err
  }
}
