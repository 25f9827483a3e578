export type {
  CommonOptions,
  DirectoryOptions,
  DirectoryOutcome,
  DirectorySuccess,
  Failure,
  Found,
  HardlinkOptions,
  ListdirOptions,
  ListdirTest,
  Logger,
  Outcome,
  OutcomeStatus,
  Query,
  StatusOptions,
  Success,
  SymlinkOptions,
} from './types.js'
export type { ContextOptions } from './core/context.js'
export type { FS, IdDatabase } from './core/fs.js'
export type { PathstateConfig, ConfigEnv } from './config.js'

export { Reconciler, mkReconciler } from './reconciler.js'
export { ReconcilerContext, defaultLogger } from './core/context.js'
export { TempDirRegistry, tempDirs } from './core/temp-dirs.js'
export { nodeFS } from './core/fs.js'
export { CHANGED, UNCHANGED, isChanged, isFailure } from './core/runner.js'
export {
  OSError,
  PathstateError,
  PreconditionError,
  UnsupportedOperationError,
  ValidationError,
  errorMessage,
} from './core/errors.js'
export { getGlobalConfigPath, loadReconcilerOptions, readGlobalConfig } from './config.js'
