import { execFileSync } from 'child_process'
import fs from 'fs-extra'
import type { Dir, Stats } from 'fs'

import { errorCode } from './errors.js'

export type IdDatabase = 'passwd' | 'group'

// getent exits with 2 when the key is not in the database
const GETENT_NOT_FOUND = 2

function exitStatus(e: unknown): number | undefined {
  if (typeof e !== 'object' || e === null || !('status' in e)) return undefined
  return typeof e.status === 'number' ? e.status : undefined
}

/**
 * Every filesystem call the reconciler makes goes through this seam, so tests
 * can substitute single calls.
 */
export interface FS {
  lstat(p: string): Stats
  stat(p: string): Stats
  readlink(p: string): string
  symlink(target: string, p: string): void
  link(existing: string, p: string): void
  unlink(p: string): void
  /**
   * rename(2): replaces `to` in one step, fails with EXDEV across filesystems.
   */
  rename(from: string, to: string): void
  /**
   * Recursive copy, preserving symlinks.
   */
  copy(from: string, to: string): void
  remove(p: string): void
  mkdirp(p: string, mode?: number): void
  mkdtemp(prefix: string): string
  chmod(p: string, mode: number): void
  chown(p: string, uid: number, gid: number): void
  utimes(p: string, atime: Date, mtime: Date): void
  opendir(p: string): Dir
  /**
   * passwd or group entries for `name`, in the colon separated file format.
   * Empty when the name is unknown.
   */
  getent(db: IdDatabase, name: string): string
}

export const nodeFS: FS = {
  lstat: (p) => fs.lstatSync(p),
  stat: (p) => fs.statSync(p),
  readlink: (p) => fs.readlinkSync(p),
  symlink: (target, p) => fs.symlinkSync(target, p),
  link: (existing, p) => fs.linkSync(existing, p),
  unlink: (p) => fs.unlinkSync(p),
  rename: (from, to) => fs.renameSync(from, to),
  copy: (from, to) => fs.copySync(from, to, { dereference: false, preserveTimestamps: true }),
  remove: (p) => fs.removeSync(p),
  mkdirp: (p, mode) => fs.ensureDirSync(p, mode === undefined ? undefined : { mode }),
  mkdtemp: (prefix) => fs.mkdtempSync(prefix),
  chmod: (p, mode) => fs.chmodSync(p, mode),
  chown: (p, uid, gid) => fs.chownSync(p, uid, gid),
  utimes: (p, atime, mtime) => fs.utimesSync(p, atime, mtime),
  opendir: (p) => fs.opendirSync(p),
  getent: (db, name) => {
    try {
      return execFileSync('getent', [db, name], { encoding: 'utf8', stdio: ['ignore', 'pipe', 'ignore'] })
    } catch (e: unknown) {
      if (exitStatus(e) === GETENT_NOT_FOUND) return ''
      // no getent on this system: the flat file is all there is
      if (errorCode(e) === 'ENOENT') return fs.readFileSync(`/etc/${db}`, 'utf8')
      throw e
    }
  },
}
