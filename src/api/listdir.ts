import type { Dir } from 'fs'

import { ReconcilerContext } from '../core/context.js'
import { OSError, PreconditionError, ValidationError } from '../core/errors.js'
import { directoryExists, fileExists } from '../core/predicates.js'
import { runOperation } from '../core/runner.js'
import { untaintPath } from '../core/untaint.js'
import { ListdirOptions, ListdirTest, Query } from '../types.js'

const notDotEntry: ListdirTest = (name) => name !== '.' && name !== '..'

function open(ctx: ReconcilerContext, dir: string): Dir {
  try {
    return ctx.fs.opendir(dir)
  } catch (e: unknown) {
    throw new OSError(`listdir: opendir ${dir} failed`, e)
  }
}

function scan(ctx: ReconcilerContext, dir: string, test: ListdirTest): string[] {
  const names: string[] = []
  const handle = open(ctx, dir)
  try {
    for (let entry = handle.readSync(); entry !== null; entry = handle.readSync()) {
      if (test(entry.name, dir)) names.push(entry.name)
    }
  } catch (e: unknown) {
    throw new OSError(`listdir: readdir ${dir} failed`, e)
  } finally {
    handle.closeSync()
  }
  return names
}

/**
 * Sorted entry names of `dir`, without `.` and `..`.
 *
 * `test`, `filter` and `fileExists` must all accept a name for it to be kept;
 * `inverse` negates that combination.
 */
export function listdir(ctx: ReconcilerContext, dir: string, opts: ListdirOptions = {}): Query<string[]> {
  return runOperation(ctx, 'listdir', () => {
    const untainted = untaintPath(dir, 'listdir directory')
    const base = untainted.replace(/\/+$/, '') || '/'

    if (!directoryExists(base, ctx.fs)) {
      throw new PreconditionError(`listdir: directory ${base} is not a directory`)
    }

    const tests: ListdirTest[] = []
    if (opts.test !== undefined) {
      if (typeof opts.test !== 'function') {
        throw new ValidationError('listdir: test option must be a function')
      }
      tests.push(opts.test)
    }
    if (opts.filter !== undefined) {
      const re = typeof opts.filter === 'string' ? new RegExp(opts.filter) : opts.filter
      tests.push((name) => {
        re.lastIndex = 0
        return re.test(name)
      })
    }
    if (opts.fileExists) {
      tests.push((name, d) => fileExists(`${d}/${name}`, ctx.fs))
    }

    let names: string[]
    if (opts.inverse) {
      // with nothing to invert, everything is kept
      const combined: ListdirTest = (name, d) => tests.length === 0 || !tests.every(t => t(name, d))
      names = scan(ctx, base, notDotEntry).sort().filter(name => combined(name, base))
    } else {
      // the first test runs during the scan, the rest on the sorted names
      const [first = notDotEntry, ...rest] = tests
      names = scan(ctx, base, first).sort()
      for (const t of [...rest, notDotEntry]) {
        names = names.filter(name => t(name, base))
      }
    }

    const value = opts.adddir ? names.map(name => base === '/' ? `/${name}` : `${base}/${name}`) : names
    return { status: 'ok' as const, value }
  })
}
