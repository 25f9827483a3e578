import fs from 'fs-extra'
import os from 'node:os'
import path from 'node:path'
import { vi } from 'vitest'
import type { Mock } from 'vitest'

import type { Logger } from '../src/types.js'

export type RecordingLogger = { [K in keyof Logger]: Mock<(msg: string) => void> }

export function mkLogger(): RecordingLogger {
  return {
    trace: vi.fn<(msg: string) => void>(),
    debug: vi.fn<(msg: string) => void>(),
    verbose: vi.fn<(msg: string) => void>(),
    warn: vi.fn<(msg: string) => void>(),
    error: vi.fn<(msg: string) => void>(),
  }
}

export async function mkTmp(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'pathstate-test-'))
}

export function osError(code: string, message: string): Error {
  return Object.assign(new Error(`${code}: ${message}`), { code })
}
