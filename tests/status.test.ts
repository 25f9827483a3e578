import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import fs from 'fs-extra'
import path from 'node:path'

import { status } from '../src/api/status.js'
import { ReconcilerContext } from '../src/core/context.js'
import { FS, IdDatabase, nodeFS } from '../src/core/fs.js'
import { parseId } from '../src/core/ids.js'
import { mkLogger, mkTmp } from './helpers.js'

describe('status', () => {
  let tmp: string
  let file: string
  let ctx: ReconcilerContext

  beforeEach(async () => {
    tmp = await mkTmp()
    file = path.join(tmp, 'f')
    await fs.writeFile(file, 'x')
    await fs.chmod(file, 0o644)
    ctx = new ReconcilerContext()
  })

  afterEach(async () => {
    await fs.remove(tmp)
  })

  it('fails on a missing path without creating it', async () => {
    const missing = path.join(tmp, 'missing')
    expect(status(ctx, missing, { mode: 0o600 })).toEqual({
      status: 'failed',
      message: `status: ${missing} does not exist`,
    })
    expect(await fs.pathExists(missing)).toBe(false)
  })

  it('is exact about the mode', async () => {
    expect(status(ctx, file, { mode: 0o644 })).toEqual({ status: 'unchanged' })
    expect(status(ctx, file, { mode: 0o600 })).toEqual({ status: 'changed' })
    expect((await fs.stat(file)).mode & 0o7777).toBe(0o600)
    expect(status(ctx, file, { mode: 0o600 })).toEqual({ status: 'unchanged' })
  })

  it('accepts an mtime in seconds or as a Date', async () => {
    expect(status(ctx, file, { mtime: 1_000_000_000 })).toEqual({ status: 'changed' })
    expect(Math.floor((await fs.stat(file)).mtimeMs / 1000)).toBe(1_000_000_000)
    expect(status(ctx, file, { mtime: new Date(1_000_000_000 * 1000) })).toEqual({ status: 'unchanged' })
  })

  it('leaves unspecified attributes alone', () => {
    expect(status(ctx, file)).toEqual({ status: 'unchanged' })
  })

  it('changes only the owner when the group already matches', () => {
    const st = fs.statSync(file)
    const chown = vi.fn<(p: string, uid: number, gid: number) => void>()
    const spy: FS = { ...nodeFS, chown }
    const res = status(new ReconcilerContext({ fs: spy }), file, { owner: st.uid + 1, group: st.gid })

    expect(res).toEqual({ status: 'changed' })
    expect(chown).toHaveBeenCalledWith(file, st.uid + 1, st.gid)
  })

  it('resolves owner and group names through the system databases', () => {
    const st = fs.statSync(file)
    const chown = vi.fn<(p: string, uid: number, gid: number) => void>()
    const entries: Record<string, string> = {
      'passwd:deploy': `deploy:x:${st.uid}:${st.gid}::/home/deploy:/bin/sh\n`,
      'group:staff': `staff:x:${st.gid}:deploy\n`,
    }
    const getent = vi.fn<(db: IdDatabase, name: string) => string>((db, name) => entries[`${db}:${name}`] ?? '')
    const fake: FS = { ...nodeFS, chown, getent }
    const c = new ReconcilerContext({ fs: fake })

    expect(status(c, file, { owner: 'deploy', group: 'staff' })).toEqual({ status: 'unchanged' })
    expect(getent).toHaveBeenCalledWith('passwd', 'deploy')
    expect(getent).toHaveBeenCalledWith('group', 'staff')

    getent.mockClear()
    expect(status(c, file, { owner: String(st.uid) })).toEqual({ status: 'unchanged' })
    expect(getent).not.toHaveBeenCalled()
    expect(chown).not.toHaveBeenCalled()

    expect(status(c, file, { owner: 'nobody-here' })).toEqual({ status: 'failed', message: 'Unknown user: nobody-here' })
  })

  it('rejects an invalid mode', () => {
    expect(status(ctx, file, { mode: 0o10000 })).toEqual({ status: 'failed', message: 'Invalid mode: 4096' })
  })

  it('reads but does not write in simulate mode', async () => {
    const logger = mkLogger()
    const sim = new ReconcilerContext({ simulateOnly: true, logger })

    expect(status(sim, file, { mode: 0o600 })).toEqual({ status: 'changed' })
    expect((await fs.stat(file)).mode & 0o7777).toBe(0o644)
    expect(logger.trace).toHaveBeenCalledWith(`[pathstate] would change mode of ${file} to 0600`)

    expect(status(sim, file, { mode: 0o600, keepsState: true })).toEqual({ status: 'changed' })
    expect((await fs.stat(file)).mode & 0o7777).toBe(0o600)
  })
})

describe('parseId', () => {
  const db = '# comment\nroot:x:0:0:root:/root:/bin/sh\n\nweb:x:33:33::/var/www:/usr/sbin/nologin\n'

  it('finds the id in the third field', () => {
    expect(parseId(db, 'web')).toBe(33)
    expect(parseId(db, 'root')).toBe(0)
  })

  it('returns undefined for an unknown name', () => {
    expect(parseId(db, 'ghost')).toBeUndefined()
    expect(parseId('', 'web')).toBeUndefined()
  })
})
