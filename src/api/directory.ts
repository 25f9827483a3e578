import path from 'path'

import { ReconcilerContext } from '../core/context.js'
import { OSError, PathstateError, PreconditionError } from '../core/errors.js'
import { directoryExists } from '../core/predicates.js'
import { isFailure, runOperation } from '../core/runner.js'
import { untaintPath } from '../core/untaint.js'
import { DirectoryOptions, DirectoryOutcome, DirectorySuccess } from '../types.js'
import { status } from './status.js'

const TEMPLATE_PLACEHOLDER = /X{4}$/
const TRAILING_PLACEHOLDERS = /X+$/

/**
 * Pad a temporary directory template so it ends in at least four `X`.
 */
export function tempTemplate(dir: string): string {
  return TEMPLATE_PLACEHOLDER.test(dir) ? dir : `${dir}XXXX`
}

/**
 * Make sure `dir` exists (creating parents as needed) and carries the
 * requested owner, group, mode and mtime.
 *
 * With `temp`, `dir` is a template: its trailing `X` run is replaced by a
 * unique suffix and the directory is removed when the process exits.
 */
export function directory(ctx: ReconcilerContext, dir: string, opts: DirectoryOptions = {}): DirectoryOutcome {
  return runOperation(ctx, 'directory', (): DirectorySuccess => {
    let resolved = untaintPath(dir, 'directory')
    const { fs, logger } = ctx
    const { temp, ...statusOpts } = opts
    let created = true

    if (temp) {
      const template = tempTemplate(resolved)
      if (ctx.resolveDryRun(opts.keepsState, 'directory (tempdir)')) {
        logger.verbose(`[pathstate] simulate only, not creating temporary directory ${template}`)
        return { status: 'changed' }
      }

      const base = path.dirname(template)
      if (!directoryExists(base, fs)) {
        const res = directory(ctx, base, statusOpts)
        if (isFailure(res)) {
          throw new PreconditionError(`Failed to create basedir for temporary directory ${template}: ${res.message}`)
        }
      }

      try {
        resolved = fs.mkdtemp(template.replace(TRAILING_PLACEHOLDERS, ''))
      } catch (e: unknown) {
        throw new OSError(`Failed to create temporary directory ${template}`, e)
      }
      ctx.tempDirs.register(resolved, logger, fs)
      logger.debug(`[pathstate] created temporary directory ${resolved}`)
    } else if (directoryExists(resolved, fs)) {
      created = false
      logger.debug(`[pathstate] directory ${resolved} already exists`)
    } else if (ctx.resolveDryRun(opts.keepsState, 'directory')) {
      logger.verbose(`[pathstate] simulate only, not creating directory ${resolved}`)
      return { status: 'changed', path: resolved }
    } else {
      try {
        // owner, group and mtime wait for the status pass
        fs.mkdirp(resolved, opts.mode)
      } catch (e: unknown) {
        throw new OSError(`Failed to create directory ${resolved}`, e)
      }
      logger.debug(`[pathstate] created directory ${resolved}`)
    }

    const res = status(ctx, resolved, statusOpts)
    if (isFailure(res)) {
      throw new PathstateError(res.message)
    }
    return { status: created || res.status === 'changed' ? 'changed' : 'unchanged', path: resolved }
  })
}
