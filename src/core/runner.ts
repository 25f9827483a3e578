import { ReconcilerContext } from './context.js'
import { errorMessage } from './errors.js'
import { Failure, Outcome, Success } from '../types.js'

export const CHANGED: Success = Object.freeze({ status: 'changed' })
export const UNCHANGED: Success = Object.freeze({ status: 'unchanged' })

export function changedIf(changed: boolean): Success {
  return changed ? CHANGED : UNCHANGED
}

export function isFailure<T extends { status: string }>(o: T | Failure): o is Failure {
  return o.status === 'failed'
}

export function isChanged(o: Outcome): boolean {
  return o.status === 'changed'
}

/**
 * The single exit of every public operation: `lastFailure` is reset on entry,
 * and anything thrown by `fn` becomes a failure outcome with its message stored.
 * Only the outermost operation logs its failure as an error; a nested one logs
 * at debug, since its caller reports it again with more context.
 */
export function runOperation<T extends { status: 'ok' | 'unchanged' | 'changed' }>(
  ctx: ReconcilerContext,
  operation: string,
  fn: () => T,
): T | Failure {
  ctx.lastFailure = undefined
  ctx.depth++
  try {
    return fn()
  } catch (e: unknown) {
    const message = errorMessage(e)
    ctx.lastFailure = message
    const line = `[pathstate] ${operation} failed: ${message}`
    if (ctx.depth > 1) ctx.logger.debug(line)
    else ctx.logger.error(line)
    return { status: 'failed', message }
  } finally {
    ctx.depth--
  }
}
