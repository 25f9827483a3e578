export type OutcomeStatus = 'failed' | 'unchanged' | 'changed'

export interface Failure {
  status: 'failed'
  /**
   * Human readable reason, also stored as the context's `lastFailure`.
   */
  message: string
}

export interface Success {
  status: 'unchanged' | 'changed'
}

export type Outcome = Failure | Success

export interface DirectorySuccess extends Success {
  /**
   * The resolved directory. For a temporary directory this is the expanded
   * template; it is absent when a temporary directory was only simulated.
   */
  path?: string
}

export type DirectoryOutcome = Failure | DirectorySuccess

export interface Found<T> {
  status: 'ok'
  value: T
}

export type Query<T> = Found<T> | Failure

export interface Logger {
  trace(msg: string): void
  debug(msg: string): void
  verbose(msg: string): void
  warn(msg: string): void
  error(msg: string): void
}

export interface CommonOptions {
  /**
   * If true, the call really mutates even when the context simulates.
   */
  keepsState?: boolean
}

export interface StatusOptions extends CommonOptions {
  /**
   * Numeric uid or user name. Names are looked up with `getent`, so NSS
   * sources such as LDAP resolve too; without `getent` only /etc/passwd is read.
   */
  owner?: number | string
  /**
   * Numeric gid or group name, looked up like `owner`.
   */
  group?: number | string
  mode?: number
  /**
   * Epoch seconds or a Date; compared at one second resolution.
   */
  mtime?: number | Date
}

export interface DirectoryOptions extends StatusOptions {
  temp?: boolean
}

export interface SymlinkOptions extends CommonOptions {
  force?: boolean
  check?: boolean
  nocheck?: boolean
}

/**
 * An existing regular file at the link path is always brought in line with
 * the target; there is nothing to force.
 */
export type HardlinkOptions = CommonOptions

export type ListdirTest = (name: string, dir: string) => boolean

export interface ListdirOptions {
  test?: ListdirTest
  filter?: string | RegExp
  fileExists?: boolean
  inverse?: boolean
  adddir?: boolean
}
