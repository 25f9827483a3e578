export class PathstateError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * Invalid input: a path that cannot be untainted or a malformed option.
 */
export class ValidationError extends PathstateError {}

/**
 * The filesystem is not in a state the operation can start from.
 */
export class PreconditionError extends PathstateError {}

/**
 * A filesystem call failed. The message ends with the OS error text.
 */
export class OSError extends PathstateError {
  code?: string

  constructor(message: string, cause: unknown) {
    super(`${message}: ${errorMessage(cause)}`, { cause })
    this.code = errorCode(cause)
  }
}

export class UnsupportedOperationError extends PathstateError {}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message
  return String(e)
}

export function errorCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined
  return typeof e.code === 'string' ? e.code : undefined
}
