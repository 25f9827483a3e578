import { ReconcilerContext } from '../core/context.js'
import { PreconditionError } from '../core/errors.js'
import { fileExists, isSymlink } from '../core/predicates.js'
import { runOperation } from '../core/runner.js'
import { untaintPath } from '../core/untaint.js'
import { Query } from '../types.js'

function requireFileOrSymlink(ctx: ReconcilerContext, p: string, what: string) {
  if (!fileExists(p, ctx.fs) && !isSymlink(p, ctx.fs)) {
    throw new PreconditionError(`${what}: ${p} doesn't exist or is not a file`)
  }
}

/**
 * Number of other names for the inode of `p` (0 when it has only one).
 */
export function hasHardlinks(ctx: ReconcilerContext, p: string): Query<number> {
  return runOperation(ctx, 'hasHardlinks', () => {
    const file = untaintPath(p, 'hasHardlinks')
    requireFileOrSymlink(ctx, file, 'hasHardlinks')
    const nlink = ctx.fs.lstat(file).nlink
    ctx.logger.trace(`[pathstate] number of links to ${file}: ${nlink}`)
    return { status: 'ok' as const, value: nlink > 0 ? nlink - 1 : 0 }
  })
}

/**
 * `true` when two distinct paths share an inode, `false` when they don't or
 * are the same path. Argument order does not matter.
 */
export function isHardlink(ctx: ReconcilerContext, p1: string, p2: string): Query<boolean> {
  return runOperation(ctx, 'isHardlink', () => {
    const path1 = untaintPath(p1, 'isHardlink path1')
    const path2 = untaintPath(p2, 'isHardlink path2')
    requireFileOrSymlink(ctx, path1, 'isHardlink')
    requireFileOrSymlink(ctx, path2, 'isHardlink')

    const st1 = ctx.fs.lstat(path1)
    const st2 = ctx.fs.lstat(path2)
    ctx.logger.trace(`[pathstate] comparing ${path1} inode (${st1.ino}) and ${path2} inode (${st2.ino})`)
    const same = st1.ino === st2.ino && st1.dev === st2.dev && path1 !== path2
    return { status: 'ok' as const, value: same }
  })
}
