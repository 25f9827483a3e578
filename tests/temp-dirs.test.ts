import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import fs from 'fs-extra'
import path from 'node:path'

import { FS, nodeFS } from '../src/core/fs.js'
import { TempDirRegistry } from '../src/core/temp-dirs.js'
import { mkLogger, mkTmp, osError } from './helpers.js'

describe('TempDirRegistry', () => {
  let tmp: string

  beforeEach(async () => {
    tmp = await mkTmp()
  })

  afterEach(async () => {
    await fs.remove(tmp)
  })

  it('hooks process exit once and removes registered directories', async () => {
    const proc = { once: vi.fn() }
    const registry = new TempDirRegistry(proc)
    const logger = mkLogger()
    const a = path.join(tmp, 'a')
    const b = path.join(tmp, 'b')
    await fs.outputFile(path.join(a, 'f'), 'x')
    await fs.ensureDir(b)

    registry.register(a, logger)
    registry.register(b, logger)
    expect(proc.once).toHaveBeenCalledTimes(1)

    const onExit = proc.once.mock.calls[0][1]
    expect(proc.once.mock.calls[0][0]).toBe('exit')
    onExit()

    expect(await fs.pathExists(a)).toBe(false)
    expect(await fs.pathExists(b)).toBe(false)
    expect(registry.list()).toEqual([])
  })

  it('traces removal failures instead of throwing', () => {
    const registry = new TempDirRegistry({ once: vi.fn() })
    const logger = mkLogger()
    const failing: FS = { ...nodeFS, remove: () => { throw osError('EBUSY', 'resource busy') } }

    registry.register('/some/dir', logger, failing)
    expect(() => registry.removeAll()).not.toThrow()
    expect(logger.trace).toHaveBeenCalledWith(
      '[pathstate] failed to remove temporary directory /some/dir: EBUSY: resource busy',
    )
  })
})
