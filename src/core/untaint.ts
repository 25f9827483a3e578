import { ValidationError } from './errors.js'

/**
 * Returns `p` if it can be handed to the OS: a non-empty string without NUL bytes.
 */
export function untaintPath(p: string | undefined, what: string): string {
  if (typeof p !== 'string' || p.length === 0 || p.includes('\0')) {
    throw new ValidationError(`Failed to untaint ${what}: path ${JSON.stringify(p ?? null)}`)
  }
  return p
}
