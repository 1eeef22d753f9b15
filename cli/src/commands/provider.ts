import { defineCommand } from 'citty'
import { $ } from 'zx'
import * as os from 'os'
import * as path from 'path'
import fs from 'fs-extra'
import { normalizeDelayArg } from '../installers/config.js'
import { ProvisionError, ProvisionErrorCode } from '../installers/errors.js'
import { sleep, spawnDetached } from '../installers/exec.js'
import { PROVIDER_BIN, providerLogPath, type ProviderLogType } from '../installers/paths.js'

export async function providerRunning(): Promise<boolean> {
  const out = await $({ nothrow: true })`golemsp status`
  return out.exitCode === 0 && out.stdout.includes('is running')
}

export function normalizeLogTypeArg(value: string | undefined): ProviderLogType {
  const normalized = (value ?? '').trim().toLowerCase()
  if (normalized === '' || normalized === 'golem') return 'golem'
  if (normalized === 'provider') return 'provider'
  throw new ProvisionError(ProvisionErrorCode.INVALID_CONFIG, `Invalid log type "${value}" (use golem|provider).`)
}

export function normalizeLinesArg(value: string | undefined): number {
  if (value === undefined || value.trim() === '') return 50
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ProvisionError(ProvisionErrorCode.INVALID_CONFIG, `Invalid line count "${value}".`)
  }
  return parsed
}

/** The last `count` lines of `text`, each newline-terminated. */
export function lastLines(text: string, count: number): string {
  const lines = text.split('\n')
  if (lines[lines.length - 1] === '') lines.pop()
  const tail = lines.slice(-count)
  return tail.length > 0 ? `${tail.join('\n')}\n` : ''
}

const status = defineCommand({
  meta: { name: 'status', description: 'Show provider status' },
  async run() {
    const out = await $({ nothrow: true })`golemsp status`
    process.stdout.write(out.stdout || out.stderr)
    if (out.exitCode !== 0) process.exitCode = 1
  }
})

const start = defineCommand({
  meta: { name: 'start', description: 'Start the provider in the background' },
  async run() {
    if (await providerRunning()) {
      process.stdout.write('Provider is already running\n')
      return
    }
    const logPath = providerLogPath(os.homedir(), 'golem')
    await fs.ensureDir(path.dirname(logPath))
    const pid = spawnDetached(PROVIDER_BIN, ['run'], logPath)
    process.stdout.write(`Provider started (pid ${pid ?? 'unknown'}), logging to ${logPath}\n`)

    await sleep(normalizeDelayArg(process.env.SETTLE_DELAY_MS))
    if (!(await providerRunning())) {
      process.stderr.write(`Provider did not come up; see ${logPath}\n`)
      process.exitCode = 1
    }
  }
})

const stop = defineCommand({
  meta: { name: 'stop', description: 'Stop the provider' },
  async run() {
    if (!(await providerRunning())) {
      process.stdout.write('Provider is not running\n')
      return
    }
    await $`golemsp stop`
    process.stdout.write('Provider stopped\n')
  }
})

const logs = defineCommand({
  meta: { name: 'logs', description: 'Print the end of the golem or provider log' },
  args: {
    type: { type: 'string', description: 'golem|provider', default: 'golem' },
    lines: { type: 'string', description: 'Number of lines to print', default: '50' }
  },
  async run({ args }) {
    const type = normalizeLogTypeArg(args.type)
    const count = normalizeLinesArg(args.lines)
    const logPath = providerLogPath(os.homedir(), type)
    if (!(await fs.pathExists(logPath))) {
      process.stderr.write(`Log file not found: ${logPath}\n`)
      process.exitCode = 1
      return
    }
    process.stdout.write(lastLines(await fs.readFile(logPath, 'utf8'), count))
  }
})

export const providerCommand = defineCommand({
  meta: { name: 'provider', description: 'Control the installed Golem provider' },
  subCommands: { status, start, stop, logs }
})
