import { which } from 'zx'
import { spawn } from 'node:child_process'
import { openSync, closeSync } from 'node:fs'
import type { Logger } from './types.js'

// Commands built from dynamic argument lists go through spawn; zx `$` is
// kept for the fixed one-liners in commands/provider.ts.

export async function needCmd(cmd: string): Promise<boolean> {
  try {
    await which(cmd)
    return true
  } catch {
    return false
  }
}

export async function runCommand(
  cmd: string,
  args: string[],
  options: { dryRun: boolean; logger?: Logger; cwd?: string } = { dryRun: false }
): Promise<void> {
  if (options.dryRun) {
    options.logger?.log(`[dry-run] ${formatCommand(cmd, args)}`)
    return
  }
  options.logger?.log(`$ ${formatCommand(cmd, args)}`)
  const proc = spawn(cmd, args, {
    stdio: 'inherit',
    cwd: options.cwd || process.cwd(),
    shell: false
  })
  await new Promise<void>((resolve, reject) => {
    proc.on('error', reject)
    proc.on('exit', (code) => {
      if (code === 0) return resolve()
      reject(new Error(`Command failed (${code}): ${cmd} ${args.join(' ')}`))
    })
  })
}

export interface CaptureResult {
  stdout: string
  code: number
}

/** Runs a read-only command and collects stdout. Never rejects: a command that cannot start reports code 127. */
export async function captureCommand(cmd: string, args: string[]): Promise<CaptureResult> {
  return new Promise<CaptureResult>((resolve) => {
    const proc = spawn(cmd, args, { stdio: ['ignore', 'pipe', 'ignore'], shell: false })
    let stdout = ''
    proc.stdout.setEncoding('utf8')
    proc.stdout.on('data', (chunk: string) => { stdout += chunk })
    proc.on('error', () => resolve({ stdout: '', code: 127 }))
    proc.on('close', (code) => resolve({ stdout, code: code ?? 1 }))
  })
}

export interface InteractiveProcess {
  output: AsyncIterable<string>
  write: (text: string) => void
  end: () => void
  exited: Promise<number>
  /** Set once the child stops reading its stdin (EPIPE and the like). */
  inputError: () => Error | undefined
}

export function spawnInteractive(cmd: string, args: string[], options: { cwd?: string } = {}): InteractiveProcess {
  const proc = spawn(cmd, args, {
    stdio: ['pipe', 'pipe', 'inherit'],
    cwd: options.cwd || process.cwd(),
    shell: false
  })
  let inputError: Error | undefined
  proc.stdin.on('error', (error) => { inputError = error })
  const writable = () => inputError === undefined && !proc.stdin.destroyed && proc.stdin.writable
  proc.stdout.setEncoding('utf8')
  const exited = new Promise<number>((resolve) => {
    proc.on('error', () => resolve(127))
    proc.on('close', (code) => resolve(code ?? 1))
  })
  return {
    output: proc.stdout,
    write: (text) => { if (writable()) proc.stdin.write(text) },
    end: () => { if (writable()) proc.stdin.end() },
    exited,
    inputError: () => inputError
  }
}

/** Starts a long-running process that outlives this CLI, appending its output to logPath. */
export function spawnDetached(cmd: string, args: string[], logPath: string): number | undefined {
  const fd = openSync(logPath, 'a')
  try {
    const proc = spawn(cmd, args, { detached: true, stdio: ['ignore', fd, fd], shell: false })
    proc.unref()
    return proc.pid
  } finally {
    closeSync(fd)
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export function formatCommand(cmd: string, args: string[]): string {
  return [cmd, ...args].map((a) => (a.includes(' ') ? `"${a}"` : a)).join(' ')
}
