import { errorMessage } from './errors.js'
import { FS, nodeFS } from './fs.js'
import { Logger } from '../types.js'

interface Registered {
  dir: string
  fs: FS
  logger: Logger
}

/**
 * Temporary directories to remove, best effort, when the process exits.
 */
export class TempDirRegistry {
  private readonly entries: Registered[] = []
  private hooked = false

  constructor(private readonly proc: Pick<NodeJS.Process, 'once'> = process) {}

  register(dir: string, logger: Logger, fs: FS = nodeFS): void {
    this.entries.push({ dir, fs, logger })
    if (!this.hooked) {
      this.hooked = true
      this.proc.once('exit', () => this.removeAll())
    }
  }

  list(): string[] {
    return this.entries.map(e => e.dir)
  }

  /**
   * Removes every registered directory. Failures are traced, never thrown.
   */
  removeAll(): void {
    for (const { dir, fs, logger } of this.entries.splice(0)) {
      try {
        fs.remove(dir)
        logger.trace(`[pathstate] removed temporary directory ${dir}`)
      } catch (e: unknown) {
        logger.trace(`[pathstate] failed to remove temporary directory ${dir}: ${errorMessage(e)}`)
      }
    }
  }
}

export const tempDirs = new TempDirRegistry()
