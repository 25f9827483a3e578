import type { Stats } from 'fs'

import { FS, nodeFS } from './fs.js'

// Predicates are advisory: any error reads as "no".

function tryStat(fs: FS, p: string | undefined, follow: boolean): Stats | undefined {
  if (!p) return undefined
  try {
    return follow ? fs.stat(p) : fs.lstat(p)
  } catch {
    return undefined
  }
}

/**
 * True for a directory, or a symlink to one. A broken symlink is not a directory.
 */
export function directoryExists(p: string | undefined, fs: FS = nodeFS): boolean {
  return tryStat(fs, p, true)?.isDirectory() ?? false
}

/**
 * True for a regular file, or a symlink to one.
 */
export function fileExists(p: string | undefined, fs: FS = nodeFS): boolean {
  return tryStat(fs, p, true)?.isFile() ?? false
}

/**
 * True for anything with a directory entry, broken symlinks included.
 */
export function anyExists(p: string | undefined, fs: FS = nodeFS): boolean {
  return tryStat(fs, p, false) !== undefined
}

export function isSymlink(p: string | undefined, fs: FS = nodeFS): boolean {
  return tryStat(fs, p, false)?.isSymbolicLink() ?? false
}
