import type { Stats } from 'fs'
import path from 'path'

import { ReconcilerContext } from '../core/context.js'
import { OSError, PreconditionError, UnsupportedOperationError } from '../core/errors.js'
import { FS } from '../core/fs.js'
import { anyExists, directoryExists } from '../core/predicates.js'
import { CHANGED, UNCHANGED, isFailure, runOperation } from '../core/runner.js'
import { untaintPath } from '../core/untaint.js'
import { HardlinkOptions, Outcome, Success, SymlinkOptions } from '../types.js'
import { directory } from './directory.js'

export type LinkKind = 'symlink' | 'hardlink'

function rand() {
  return Math.random().toString(16).slice(2)
}

export function tmpPathForLink(linkPath: string) {
  return `${linkPath}.tmp.${rand()}`
}

function tryLstat(fs: FS, p: string): Stats | undefined {
  try {
    return fs.lstat(p)
  } catch {
    return undefined
  }
}

function createLink(fs: FS, kind: LinkKind, target: string, linkPath: string) {
  switch (kind) {
    case 'symlink':
      fs.symlink(target, linkPath)
      break
    case 'hardlink':
      fs.link(target, linkPath)
      break
    default: {
      const _exhaustive: never = kind
      throw new UnsupportedOperationError(`Unsupported link kind: ${String(_exhaustive)}`)
    }
  }
}

/**
 * Replace an existing entry: create the link at a temp sibling, then rename it
 * into place. The old entry is untouched unless the rename succeeds.
 */
function replaceLink(fs: FS, kind: LinkKind, target: string, linkPath: string) {
  const tmp = tmpPathForLink(linkPath)
  try {
    createLink(fs, kind, target, tmp)
    fs.rename(tmp, linkPath)
  } catch (e: unknown) {
    try { fs.unlink(tmp) } catch { /* tmp was never created */ }
    throw new OSError(`Failed to replace ${linkPath} with ${kind} to ${target}`, e)
  }
}

type Existing = 'missing' | 'same' | 'other' | 'replaceable' | 'conflict'

function classifySymlink(fs: FS, st: Stats | undefined, target: string, linkPath: string, force: boolean): Existing {
  if (!st) return 'missing'
  if (st.isSymbolicLink()) {
    return fs.readlink(linkPath) === target ? 'same' : 'other'
  }
  return force && st.isFile() ? 'replaceable' : 'conflict'
}

function classifyHardlink(fs: FS, st: Stats | undefined, target: string): Existing {
  if (!st) return 'missing'
  const t = fs.lstat(target)
  if (st.ino === t.ino && st.dev === t.dev) return 'same'
  return st.isFile() ? 'other' : 'conflict'
}

function ensureLink(
  ctx: ReconcilerContext,
  kind: LinkKind,
  target: string,
  linkPath: string,
  existing: Existing,
  keepsState: boolean | undefined,
): Success {
  const { fs, logger } = ctx

  switch (existing) {
    case 'same':
      logger.debug(`[pathstate] ${kind} ${linkPath} to ${target} already exists`)
      return UNCHANGED
    case 'conflict':
      throw new PreconditionError(`Cannot create ${kind} ${linkPath}: it exists and is not a ${kind}`)
    case 'missing': {
      const parent = path.dirname(path.resolve(linkPath))
      if (!directoryExists(parent, fs)) {
        const res = directory(ctx, parent, { keepsState })
        if (isFailure(res)) {
          throw new PreconditionError(`Failed to create parent directory of ${kind} ${linkPath}: ${res.message}`)
        }
      }
      if (ctx.resolveDryRun(keepsState, kind)) {
        logger.verbose(`[pathstate] simulate only, not creating ${kind} ${linkPath} to ${target}`)
        return CHANGED
      }
      try {
        createLink(fs, kind, target, linkPath)
      } catch (e: unknown) {
        throw new OSError(`Failed to create ${kind} ${linkPath} to ${target}`, e)
      }
      logger.debug(`[pathstate] created ${kind} ${linkPath} to ${target}`)
      return CHANGED
    }
    case 'other':
    case 'replaceable':
      if (ctx.resolveDryRun(keepsState, kind)) {
        logger.verbose(`[pathstate] simulate only, not replacing ${linkPath} with ${kind} to ${target}`)
        return CHANGED
      }
      replaceLink(fs, kind, target, linkPath)
      logger.debug(`[pathstate] replaced ${linkPath} with ${kind} to ${target}`)
      return CHANGED
  }
}

/**
 * Make `linkPath` a symlink to `target`. The target is stored verbatim and by
 * default need not exist; `check` requires it to.
 */
export function symlink(ctx: ReconcilerContext, target: string, linkPath: string, opts: SymlinkOptions = {}): Outcome {
  return runOperation(ctx, 'symlink', () => {
    const link = untaintPath(linkPath, 'symlink')
    const tgt = untaintPath(target, 'symlink target')
    const check = opts.check ?? (opts.nocheck === undefined ? false : !opts.nocheck)

    if (check) {
      const resolved = path.resolve(path.dirname(path.resolve(link)), tgt)
      if (!anyExists(resolved, ctx.fs)) {
        throw new PreconditionError(`Cannot create symlink ${link}: target ${tgt} does not exist`)
      }
    }

    const st = tryLstat(ctx.fs, link)
    const existing = classifySymlink(ctx.fs, st, tgt, link, opts.force ?? false)
    return ensureLink(ctx, 'symlink', tgt, link, existing, opts.keepsState)
  })
}

/**
 * Make `linkPath` a hardlink to `target`, which must exist and live on the
 * same filesystem.
 */
export function hardlink(ctx: ReconcilerContext, target: string, linkPath: string, opts: HardlinkOptions = {}): Outcome {
  return runOperation(ctx, 'hardlink', () => {
    const link = untaintPath(linkPath, 'hardlink')
    const tgt = untaintPath(target, 'hardlink target')

    const targetSt = tryLstat(ctx.fs, tgt)
    if (!targetSt) {
      throw new PreconditionError(`Cannot create hardlink ${link}: target ${tgt} does not exist`)
    }
    if (targetSt.isDirectory()) {
      throw new PreconditionError(`Cannot create hardlink ${link}: target ${tgt} is a directory`)
    }

    const st = tryLstat(ctx.fs, link)
    const existing = classifyHardlink(ctx.fs, st, tgt)
    return ensureLink(ctx, 'hardlink', tgt, link, existing, opts.keepsState)
  })
}
