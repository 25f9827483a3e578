import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import fs from 'fs-extra'
import path from 'node:path'

import { listdir } from '../src/api/listdir.js'
import { ReconcilerContext } from '../src/core/context.js'
import { FS, nodeFS } from '../src/core/fs.js'
import { ListdirTest } from '../src/types.js'
import { mkTmp, osError } from './helpers.js'

describe('listdir', () => {
  let tmp: string
  let ctx: ReconcilerContext

  beforeEach(async () => {
    tmp = await mkTmp()
    await fs.writeFile(path.join(tmp, 'b.log'), '')
    await fs.writeFile(path.join(tmp, 'a.txt'), '')
    await fs.writeFile(path.join(tmp, '.hidden'), '')
    ctx = new ReconcilerContext()
  })

  afterEach(async () => {
    await fs.remove(tmp)
  })

  it('returns sorted names', () => {
    expect(listdir(ctx, tmp)).toEqual({ status: 'ok', value: ['.hidden', 'a.txt', 'b.log'] })
  })

  it('filters by pattern and optionally prefixes the directory', () => {
    expect(listdir(ctx, tmp, { filter: '\\.txt$' })).toEqual({ status: 'ok', value: ['a.txt'] })
    expect(listdir(ctx, tmp, { filter: '\\.txt$', adddir: true })).toEqual({
      status: 'ok',
      value: [path.join(tmp, 'a.txt')],
    })
    expect(listdir(ctx, `${tmp}//`, { filter: /^b/, adddir: true })).toEqual({
      status: 'ok',
      value: [path.join(tmp, 'b.log')],
    })
  })

  it('inverts the filter', () => {
    expect(listdir(ctx, tmp, { filter: '\\.txt$', inverse: true })).toEqual({
      status: 'ok',
      value: ['.hidden', 'b.log'],
    })
  })

  it('keeps everything when inverse has nothing to invert', () => {
    expect(listdir(ctx, tmp, { inverse: true })).toEqual({ status: 'ok', value: ['.hidden', 'a.txt', 'b.log'] })
  })

  it('keeps only files with fileExists', async () => {
    await fs.ensureDir(path.join(tmp, 'sub'))
    expect(listdir(ctx, tmp, { fileExists: true })).toEqual({ status: 'ok', value: ['.hidden', 'a.txt', 'b.log'] })
    expect(listdir(ctx, tmp, { fileExists: true, inverse: true })).toEqual({ status: 'ok', value: ['sub'] })
  })

  it('passes name and directory to the test function', () => {
    const test = vi.fn<ListdirTest>((name) => name.startsWith('a'))
    expect(listdir(ctx, tmp, { test })).toEqual({ status: 'ok', value: ['a.txt'] })
    expect(test).toHaveBeenCalledWith('a.txt', tmp)
    expect(test).toHaveBeenCalledTimes(3)
  })

  it('inverts the combination of test and filter', async () => {
    await fs.ensureDir(path.join(tmp, 'sub'))
    const test: ListdirTest = (name) => name.endsWith('.txt') || name.endsWith('.log')
    expect(listdir(ctx, tmp, { test, filter: '^a' })).toEqual({ status: 'ok', value: ['a.txt'] })
    expect(listdir(ctx, tmp, { test, filter: '^a', inverse: true })).toEqual({
      status: 'ok',
      value: ['.hidden', 'b.log', 'sub'],
    })
  })

  it('fails on something that is not a directory', () => {
    const file = path.join(tmp, 'a.txt')
    expect(listdir(ctx, file)).toEqual({ status: 'failed', message: `listdir: directory ${file} is not a directory` })
    expect(ctx.lastFailure).toBe(`listdir: directory ${file} is not a directory`)
  })

  it('reports the OS error when the scan fails', () => {
    const failing: FS = {
      ...nodeFS,
      opendir: () => { throw osError('EACCES', 'permission denied') },
    }
    expect(listdir(new ReconcilerContext({ fs: failing }), tmp)).toEqual({
      status: 'failed',
      message: `listdir: opendir ${tmp} failed: EACCES: permission denied`,
    })
  })
})
