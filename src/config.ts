import fs from 'fs-extra'
import os from 'os'
import path from 'path'

import { ContextOptions } from './core/context.js'

export interface PathstateConfig {
  simulateOnly?: boolean
  backup?: string
}

export interface ConfigEnv {
  env?: NodeJS.ProcessEnv
  /**
   * For tests or embedding, override home dir (default: os.homedir()).
   */
  homeDir?: string
}

export const SIMULATE_ENV = 'PATHSTATE_SIMULATE'

export function getGlobalConfigPath(opts: ConfigEnv = {}): string {
  const env = opts.env ?? process.env
  const base = env.XDG_CONFIG_HOME || path.join(opts.homeDir ?? os.homedir(), '.config')
  return path.join(base, 'pathstate', 'config.json')
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v)
}

export function normalizeConfig(raw: unknown): PathstateConfig {
  if (!isRecord(raw)) return {}
  const cfg: PathstateConfig = {}
  if (typeof raw.simulateOnly === 'boolean') cfg.simulateOnly = raw.simulateOnly
  if (typeof raw.backup === 'string') cfg.backup = raw.backup
  return cfg
}

export async function readGlobalConfig(opts: ConfigEnv = {}): Promise<PathstateConfig> {
  const p = getGlobalConfigPath(opts)
  if (!await fs.pathExists(p)) return {}
  const json: unknown = await fs.readJson(p)
  return normalizeConfig(json)
}

/**
 * `PATHSTATE_SIMULATE` as a boolean, or undefined when unset or unrecognised.
 */
export function simulateFromEnv(env: NodeJS.ProcessEnv): boolean | undefined {
  const v = env[SIMULATE_ENV]?.trim().toLowerCase()
  if (v === '1' || v === 'true' || v === 'yes') return true
  if (v === '0' || v === 'false' || v === 'no') return false
  return undefined
}

/**
 * Context options from the global config file, then the environment, then
 * `overrides` (each one wins over the previous).
 */
export async function loadReconcilerOptions(overrides: ContextOptions = {}, opts: ConfigEnv = {}): Promise<ContextOptions> {
  const cfg = await readGlobalConfig(opts)
  const envSimulate = simulateFromEnv(opts.env ?? process.env)
  return {
    ...overrides,
    simulateOnly: overrides.simulateOnly ?? envSimulate ?? cfg.simulateOnly,
    backup: overrides.backup ?? cfg.backup,
  }
}
