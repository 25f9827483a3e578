import { FS, nodeFS } from './fs.js'
import { TempDirRegistry, tempDirs } from './temp-dirs.js'
import { Logger } from '../types.js'

export function defaultLogger(): Logger {
  return {
    trace: () => {},
    debug: () => {},
    verbose: () => {},
    warn: () => {},
    error: () => {},
  }
}

export interface ContextOptions {
  logger?: Logger
  /**
   * Dry run: mutating calls only report what they would do, unless they pass `keepsState`.
   */
  simulateOnly?: boolean
  /**
   * Default backup suffix for `cleanup` and `move`.
   */
  backup?: string
  fs?: FS
  tempDirs?: TempDirRegistry
}

/**
 * Per-caller state shared by all operations. Not safe for concurrent use:
 * `lastFailure` belongs to whichever operation ran last.
 */
export class ReconcilerContext {
  readonly logger: Logger
  readonly fs: FS
  readonly tempDirs: TempDirRegistry
  simulateOnly: boolean
  backup?: string
  lastFailure?: string
  /**
   * Operations currently running on this context; above 1 the running one was
   * called by another operation.
   */
  depth = 0

  constructor(opts: ContextOptions = {}) {
    this.logger = opts.logger ?? defaultLogger()
    this.fs = opts.fs ?? nodeFS
    this.tempDirs = opts.tempDirs ?? tempDirs
    this.simulateOnly = opts.simulateOnly ?? false
    this.backup = opts.backup
  }

  /**
   * Whether the mutation labelled `label` must be skipped.
   */
  resolveDryRun(keepsState: boolean | undefined, label: string): boolean {
    if (keepsState === true) return false
    if (this.simulateOnly) {
      this.logger.trace(`[pathstate] ${label}: simulate only`)
    }
    return this.simulateOnly
  }

  /**
   * The backup suffix for a call: the argument, else the instance default.
   * An empty string disables backup.
   */
  resolveBackup(backup: string | undefined): string | undefined {
    const suffix = backup ?? this.backup
    return suffix === undefined || suffix === '' ? undefined : suffix
  }
}
