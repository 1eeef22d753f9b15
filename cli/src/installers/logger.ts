import * as p from '@clack/prompts'
import fs from 'fs-extra'
import * as path from 'path'
import type { Logger } from './types.js'

/**
 * Console output goes through clack; when `logFile` is set every message is
 * also appended there as a plain timestamped line.
 */
export function createLogger(logFile?: string): Logger {
  if (logFile) fs.ensureDirSync(path.dirname(logFile))
  const record = (level: string, msg: string) => {
    if (logFile) fs.appendFileSync(logFile, `${new Date().toISOString()} [${level}] ${msg}\n`)
  }
  return {
    log: (msg) => { record('LOG', msg); p.log.message(msg) },
    info: (msg) => { record('INFO', msg); p.log.info(msg) },
    ok: (msg) => { record('OK', msg); p.log.success(msg) },
    warn: (msg) => { record('WARN', msg); p.log.warn(msg) },
    err: (msg) => { record('ERROR', msg); p.log.error(msg) }
  }
}
