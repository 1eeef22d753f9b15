import * as os from 'os'
import * as path from 'path'
import { createLogger } from './logger.js'
import { resolveHostPaths } from './paths.js'
import type { BaseOptions, HostContext, HostPaths, Logger } from './types.js'

export interface ContextInit<O extends BaseOptions> {
  command: string
  options: O
  rootDir: string
  homeDir?: string
  paths?: Partial<HostPaths>
  logger?: Logger
}

export function createContext<O extends BaseOptions>(init: ContextInit<O>): HostContext<O> {
  const homeDir = init.homeDir ?? os.homedir()
  const logDir = path.join(homeDir, '.local', 'share', 'golem-host')
  const logFile = path.join(logDir, `${init.command}.log`)
  return {
    cwd: process.cwd(),
    homeDir,
    rootDir: init.rootDir,
    logDir,
    logFile,
    options: init.options,
    logger: init.logger ?? createLogger(init.options.dryRun ? undefined : logFile),
    paths: resolveHostPaths(homeDir, init.paths),
    useSudo: typeof process.getuid === 'function' && process.getuid() !== 0
  }
}
