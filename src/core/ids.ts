import { ValidationError } from './errors.js'
import { FS, IdDatabase } from './fs.js'

/**
 * Finds `name` in passwd or group formatted `entries` and returns the numeric
 * id in its third field.
 */
export function parseId(entries: string, name: string): number | undefined {
  for (const line of entries.split('\n')) {
    if (!line || line.startsWith('#')) continue
    const fields = line.split(':')
    if (fields[0] !== name || fields.length < 3) continue
    const id = Number(fields[2])
    if (Number.isInteger(id)) return id
  }
  return undefined
}

function resolveId(fs: FS, value: number | string, db: IdDatabase, what: string): number {
  if (typeof value === 'number') {
    if (!Number.isInteger(value) || value < 0) {
      throw new ValidationError(`Invalid ${what} id: ${value}`)
    }
    return value
  }
  if (/^\d+$/.test(value)) return Number(value)
  const id = parseId(fs.getent(db, value), value)
  if (id === undefined) {
    throw new ValidationError(`Unknown ${what}: ${value}`)
  }
  return id
}

export function resolveUid(fs: FS, owner: number | string): number {
  return resolveId(fs, owner, 'passwd', 'user')
}

export function resolveGid(fs: FS, group: number | string): number {
  return resolveId(fs, group, 'group', 'group')
}
