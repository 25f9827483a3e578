import { cleanup } from './api/cleanup.js'
import { directory } from './api/directory.js'
import { hardlink, symlink } from './api/link.js'
import { listdir } from './api/listdir.js'
import { move } from './api/move.js'
import { hasHardlinks, isHardlink } from './api/hardlinks.js'
import { status } from './api/status.js'
import { ContextOptions, ReconcilerContext } from './core/context.js'
import { anyExists, directoryExists, fileExists, isSymlink } from './core/predicates.js'
import {
  CommonOptions,
  DirectoryOptions,
  DirectoryOutcome,
  HardlinkOptions,
  ListdirOptions,
  Logger,
  Outcome,
  Query,
  StatusOptions,
  SymlinkOptions,
} from './types.js'

/**
 * Makes paths match a declared state. Every mutating call returns an outcome
 * (`failed`, `unchanged` or `changed`) and never throws; the message of the
 * last failure is kept in `lastFailure`.
 *
 *     const paths = mkReconciler({ logger })
 *     const res = paths.directory('/srv/app/conf', { mode: 0o750 })
 *     if (res.status === 'failed') logger.error(`no conf dir: ${paths.lastFailure}`)
 */
export class Reconciler {
  readonly context: ReconcilerContext

  constructor(opts: ContextOptions | ReconcilerContext = {}) {
    this.context = opts instanceof ReconcilerContext ? opts : new ReconcilerContext(opts)
  }

  get lastFailure(): string | undefined {
    return this.context.lastFailure
  }

  get logger(): Logger {
    return this.context.logger
  }

  directoryExists(p: string | undefined): boolean {
    return directoryExists(p, this.context.fs)
  }

  fileExists(p: string | undefined): boolean {
    return fileExists(p, this.context.fs)
  }

  anyExists(p: string | undefined): boolean {
    return anyExists(p, this.context.fs)
  }

  isSymlink(p: string | undefined): boolean {
    return isSymlink(p, this.context.fs)
  }

  hasHardlinks(p: string): Query<number> {
    return hasHardlinks(this.context, p)
  }

  isHardlink(p1: string, p2: string): Query<boolean> {
    return isHardlink(this.context, p1, p2)
  }

  cleanup(dest: string, backup?: string, opts?: CommonOptions): Outcome {
    return cleanup(this.context, dest, backup, opts)
  }

  directory(p: string, opts?: DirectoryOptions): DirectoryOutcome {
    return directory(this.context, p, opts)
  }

  symlink(target: string, linkPath: string, opts?: SymlinkOptions): Outcome {
    return symlink(this.context, target, linkPath, opts)
  }

  hardlink(target: string, linkPath: string, opts?: HardlinkOptions): Outcome {
    return hardlink(this.context, target, linkPath, opts)
  }

  status(p: string, opts?: StatusOptions): Outcome {
    return status(this.context, p, opts)
  }

  move(src: string, dest: string, backup?: string, opts?: CommonOptions): Outcome {
    return move(this.context, src, dest, backup, opts)
  }

  listdir(dir: string, opts?: ListdirOptions): Query<string[]> {
    return listdir(this.context, dir, opts)
  }
}

export function mkReconciler(opts: ContextOptions = {}): Reconciler {
  return new Reconciler(opts)
}
