import path from 'path'

import { ReconcilerContext } from '../core/context.js'
import { OSError, PreconditionError, errorCode } from '../core/errors.js'
import { FS } from '../core/fs.js'
import { anyExists, directoryExists } from '../core/predicates.js'
import { CHANGED, UNCHANGED, isFailure, runOperation } from '../core/runner.js'
import { untaintPath } from '../core/untaint.js'
import { CommonOptions, Outcome } from '../types.js'
import { directory } from './directory.js'
import { hardlink, tmpPathForLink } from './link.js'

/**
 * rename(2), and across filesystems a copy to a temp sibling of `to` that is
 * renamed over it. `to` is only ever replaced in one step, never removed first.
 */
function renameOrCopy(fs: FS, from: string, to: string) {
  try {
    fs.rename(from, to)
    return
  } catch (e: unknown) {
    if (errorCode(e) !== 'EXDEV') throw e
  }
  const tmp = tmpPathForLink(to)
  try {
    fs.copy(from, tmp)
    fs.rename(tmp, to)
  } catch (e: unknown) {
    try { fs.remove(tmp) } catch { /* nothing was copied */ }
    throw e
  }
  fs.remove(from)
}

/**
 * Move `src` to `dest`. The goal is that `src` no longer exists: a missing
 * `src` is already done, and no backup of `dest` is made in that case.
 *
 * With a backup suffix, an existing `dest` is first hardlinked to `dest + backup`.
 */
export function move(ctx: ReconcilerContext, src: string, dest: string, backup?: string, opts: CommonOptions = {}): Outcome {
  return runOperation(ctx, 'move', () => {
    const from = untaintPath(src, 'move src')
    const to = untaintPath(dest, 'move dest')
    const { fs, logger } = ctx

    if (!anyExists(from, fs)) {
      logger.debug(`[pathstate] move: ${from} does not exist, nothing to move`)
      return UNCHANGED
    }

    const suffix = ctx.resolveBackup(backup)
    if (suffix !== undefined && anyExists(to, fs)) {
      const old = to + untaintPath(suffix, 'move backup')
      // a stale backup file is replaced, never itself backed up
      const res = hardlink(ctx, to, old, opts)
      if (isFailure(res)) {
        throw new PreconditionError(`move: backup of dest ${to} to ${old} failed: ${res.message}`)
      }
    }

    if (ctx.resolveDryRun(opts.keepsState, 'move')) {
      logger.verbose(`[pathstate] simulate only, not moving ${from} to ${to}`)
      return CHANGED
    }

    const base = path.dirname(to)
    if (!directoryExists(base, fs)) {
      const res = directory(ctx, base, opts)
      if (isFailure(res)) {
        throw new PreconditionError(`Failed to create basedir for dest ${to}: ${res.message}`)
      }
    }

    try {
      renameOrCopy(fs, from, to)
    } catch (e: unknown) {
      throw new OSError(`Failed to move ${from} to ${to}`, e)
    }
    logger.debug(`[pathstate] moved ${from} to ${to}`)
    return CHANGED
  })
}
