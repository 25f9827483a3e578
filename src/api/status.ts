import type { Stats } from 'fs'

import { ReconcilerContext } from '../core/context.js'
import { OSError, PreconditionError, ValidationError } from '../core/errors.js'
import { resolveGid, resolveUid } from '../core/ids.js'
import { changedIf, runOperation } from '../core/runner.js'
import { untaintPath } from '../core/untaint.js'
import { Outcome, StatusOptions } from '../types.js'

const PERMISSION_BITS = 0o7777

function mtimeSeconds(mtime: number | Date): number {
  const seconds = mtime instanceof Date ? mtime.getTime() / 1000 : mtime
  if (!Number.isFinite(seconds)) {
    throw new ValidationError(`Invalid mtime: ${String(mtime)}`)
  }
  return Math.floor(seconds)
}

function validateMode(mode: number): number {
  if (!Number.isInteger(mode) || mode < 0 || mode > PERMISSION_BITS) {
    throw new ValidationError(`Invalid mode: ${mode}`)
  }
  return mode
}

function fmtMode(mode: number) {
  return `0${mode.toString(8).padStart(3, '0')}`
}

/**
 * Set owner, group, mode and/or mtime of an existing path.
 * Only attributes that differ are written.
 */
export function status(ctx: ReconcilerContext, p: string, opts: StatusOptions = {}): Outcome {
  return runOperation(ctx, 'status', () => {
    const target = untaintPath(p, 'status')
    const { fs, logger } = ctx

    let st: Stats
    try {
      st = fs.stat(target)
    } catch (e: unknown) {
      throw new PreconditionError(`status: ${target} does not exist`, { cause: e })
    }

    const dryRun = ctx.resolveDryRun(opts.keepsState, 'status')
    let changed = false

    const uid = opts.owner === undefined ? undefined : resolveUid(fs, opts.owner)
    const gid = opts.group === undefined ? undefined : resolveGid(fs, opts.group)
    if ((uid !== undefined && uid !== st.uid) || (gid !== undefined && gid !== st.gid)) {
      const newUid = uid ?? st.uid
      const newGid = gid ?? st.gid
      changed = true
      if (dryRun) {
        logger.trace(`[pathstate] would change ownership of ${target} to ${newUid}:${newGid}`)
      } else {
        try {
          fs.chown(target, newUid, newGid)
        } catch (e: unknown) {
          throw new OSError(`Failed to change ownership of ${target} to ${newUid}:${newGid}`, e)
        }
        logger.debug(`[pathstate] changed ownership of ${target} to ${newUid}:${newGid}`)
      }
    }

    if (opts.mode !== undefined) {
      const mode = validateMode(opts.mode)
      if ((st.mode & PERMISSION_BITS) !== mode) {
        changed = true
        if (dryRun) {
          logger.trace(`[pathstate] would change mode of ${target} to ${fmtMode(mode)}`)
        } else {
          try {
            fs.chmod(target, mode)
          } catch (e: unknown) {
            throw new OSError(`Failed to change mode of ${target} to ${fmtMode(mode)}`, e)
          }
          logger.debug(`[pathstate] changed mode of ${target} to ${fmtMode(mode)}`)
        }
      }
    }

    if (opts.mtime !== undefined) {
      const seconds = mtimeSeconds(opts.mtime)
      if (Math.floor(st.mtimeMs / 1000) !== seconds) {
        changed = true
        if (dryRun) {
          logger.trace(`[pathstate] would change mtime of ${target} to ${seconds}`)
        } else {
          try {
            fs.utimes(target, st.atime, new Date(seconds * 1000))
          } catch (e: unknown) {
            throw new OSError(`Failed to change mtime of ${target} to ${seconds}`, e)
          }
          logger.debug(`[pathstate] changed mtime of ${target} to ${seconds}`)
        }
      }
    }

    return changedIf(changed)
  })
}
