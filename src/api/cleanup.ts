import { ReconcilerContext } from '../core/context.js'
import { OSError, PreconditionError } from '../core/errors.js'
import { FS } from '../core/fs.js'
import { anyExists } from '../core/predicates.js'
import { CHANGED, UNCHANGED, isFailure, runOperation } from '../core/runner.js'
import { untaintPath } from '../core/untaint.js'
import { CommonOptions, Outcome } from '../types.js'
import { move } from './move.js'

type RemoveMethod = 'rmtree' | 'unlink'

const REMOVE_DISPATCH: Record<RemoveMethod, (fs: FS, p: string) => void> = {
  rmtree: (fs, p) => fs.remove(p),
  unlink: (fs, p) => fs.unlink(p),
}

/**
 * Make sure `dest` does not exist. With a backup suffix (the argument, else
 * the context default; '' disables it), `dest` is moved to `dest + backup`
 * after any previous backup there is removed.
 */
export function cleanup(ctx: ReconcilerContext, dest: string, backup?: string, opts: CommonOptions = {}): Outcome {
  return runOperation(ctx, 'cleanup', () => {
    const target = untaintPath(dest, 'cleanup dest')
    const { fs, logger } = ctx

    if (!anyExists(target, fs)) return UNCHANGED

    const suffix = ctx.resolveBackup(backup)
    if (suffix !== undefined) {
      const old = target + untaintPath(suffix, 'cleanup backup')
      const stale = cleanup(ctx, old, '', opts)
      if (isFailure(stale)) {
        throw new PreconditionError(`cleanup: removing previous backup ${old} failed: ${stale.message}`)
      }
      const moved = move(ctx, target, old, '', opts)
      if (isFailure(moved)) {
        throw new PreconditionError(`cleanup: move to backup failed: ${moved.message}`)
      }
      return CHANGED
    }

    // a symlink to a directory is unlinked, never followed
    const method: RemoveMethod = fs.lstat(target).isDirectory() ? 'rmtree' : 'unlink'
    if (ctx.resolveDryRun(opts.keepsState, 'cleanup')) {
      logger.verbose(`[pathstate] simulate only, not going to ${method} ${target}`)
      return CHANGED
    }

    try {
      REMOVE_DISPATCH[method](fs, target)
    } catch (e: unknown) {
      throw new OSError(`Cleanup ${method} failed to remove ${target}`, e)
    }
    logger.debug(`[pathstate] cleanup ${method} removed ${target}`)
    return CHANGED
  })
}
