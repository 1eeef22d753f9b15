import fs from 'fs-extra'
import { mkdtemp } from 'fs/promises'
import * as os from 'node:os'
import * as path from 'node:path'
import { needCmd, runCommand } from './exec.js'
import { ProvisionError, ProvisionErrorCode, errorMessage } from './errors.js'
import type { HostContext, PackageManager } from './types.js'

// Only the apt family is supported; anything else is refused rather than guessed.
export async function detectPackageManager(): Promise<PackageManager> {
  if ((await needCmd('apt-get')) && (await needCmd('dpkg-query'))) return 'apt'
  return 'none'
}

export async function runPrivileged(ctx: HostContext, cmd: string, args: string[]): Promise<void> {
  const opts = { dryRun: ctx.options.dryRun, logger: ctx.logger }
  if (ctx.useSudo) return runCommand('sudo', [cmd, ...args], opts)
  return runCommand(cmd, args, opts)
}

/** Runs an action whose failure is acceptable; the failure is logged and swallowed. */
export async function bestEffort(ctx: HostContext, label: string, action: () => Promise<unknown>): Promise<void> {
  try {
    await action()
  } catch (error) {
    ctx.logger.warn(`${label} failed (ignored): ${errorMessage(error)}`)
  }
}

// Checks the target itself, or the nearest ancestor that exists.
export async function canWrite(target: string): Promise<boolean> {
  let probe = target
  while (!(await fs.pathExists(probe))) {
    const parent = path.dirname(probe)
    if (parent === probe) break
    probe = parent
  }
  try {
    await fs.access(probe, fs.constants.W_OK)
    return true
  } catch {
    return false
  }
}

export async function writeSystemFile(ctx: HostContext, target: string, content: string, mode = 0o644): Promise<void> {
  if (ctx.options.dryRun) {
    ctx.logger.log(`[dry-run] write ${target}`)
    return
  }
  if (await canWrite(target)) {
    await fs.outputFile(target, content, { encoding: 'utf8', mode })
    return
  }
  await withScratchDir('golem-host-write-', async (dir) => {
    const staged = path.join(dir, path.basename(target))
    await fs.writeFile(staged, content, 'utf8')
    await runPrivileged(ctx, 'install', ['-D', '-m', modeString(mode), staged, target])
  })
}

export async function readLines(file: string): Promise<string[]> {
  if (!(await fs.pathExists(file))) return []
  return (await fs.readFile(file, 'utf8')).split('\n')
}

/**
 * Appends each line that is not already present verbatim. Returns the lines
 * actually appended; an empty result means the file was left untouched.
 */
export async function appendMissingLines(ctx: HostContext, file: string, lines: string[]): Promise<string[]> {
  const current = (await fs.pathExists(file)) ? await fs.readFile(file, 'utf8') : ''
  const existing = new Set(current.split('\n').map((l) => l.trim()))
  const missing = lines.filter((l, i) => !existing.has(l.trim()) && lines.indexOf(l) === i)
  if (missing.length === 0) return []
  const separator = current.length > 0 && !current.endsWith('\n') ? '\n' : ''
  await writeSystemFile(ctx, file, `${current}${separator}${missing.join('\n')}\n`)
  return missing
}

/** Drops every line matching `predicate`. Returns how many lines were removed. */
export async function removeLines(
  ctx: HostContext,
  file: string,
  predicate: (line: string) => boolean,
  options: { backup?: boolean } = {}
): Promise<number> {
  if (!(await fs.pathExists(file))) return 0
  const current = await fs.readFile(file, 'utf8')
  const lines = current.split('\n')
  const kept = lines.filter((line) => !predicate(line))
  const removed = lines.length - kept.length
  if (removed === 0) return 0
  if (options.backup) {
    const backup = createBackupPath(file)
    if (ctx.options.dryRun) ctx.logger.log(`[dry-run] cp ${file} ${backup}`)
    else await fs.copy(file, backup)
    ctx.logger.info(`Backed up ${file} to ${backup}`)
  }
  await writeSystemFile(ctx, file, kept.join('\n'))
  return removed
}

/** Deletes a file or directory when present, escalating to sudo for locations we cannot write. */
export async function removePath(ctx: HostContext, target: string): Promise<boolean> {
  if (!(await fs.pathExists(target))) return false
  ctx.logger.info(`Removing: ${target}`)
  if (!(await canWrite(path.dirname(target)))) {
    await runPrivileged(ctx, 'rm', ['-rf', target])
    return true
  }
  if (ctx.options.dryRun) ctx.logger.log(`[dry-run] rm -rf ${target}`)
  else await fs.remove(target)
  return true
}

/** Scratch directory owned by `fn`; removed on every exit path. */
export async function withScratchDir<T>(prefix: string, fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(os.tmpdir(), prefix))
  try {
    return await fn(dir)
  } finally {
    await fs.remove(dir)
  }
}

export async function download(ctx: HostContext, url: string, dest: string): Promise<void> {
  ctx.logger.info(`Downloading ${url}`)
  try {
    await runCommand('curl', ['-fsSL', '-o', dest, url], { dryRun: ctx.options.dryRun, logger: ctx.logger })
  } catch (error) {
    throw new ProvisionError(
      ProvisionErrorCode.DOWNLOAD_FAILED,
      `Download failed: ${url}. Check your network connection and re-run the command to retry.`,
      { url, cause: errorMessage(error) }
    )
  }
}

export function createBackupPath(originalPath: string): string {
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, -5)
  return `${originalPath}.backup.${timestamp}`
}

export async function renderTemplate(rootDir: string, name: string, vars: Record<string, string>): Promise<string> {
  const file = path.join(rootDir, 'cli', 'templates', name)
  if (!(await fs.pathExists(file))) throw new Error(`Template not found: ${file}`)
  const raw = await fs.readFile(file, 'utf8')
  return raw.replace(/\{\{(\w+)\}\}/g, (whole, key: string) => vars[key] ?? whole)
}

export function modeString(mode: number): string {
  return `0${mode.toString(8).padStart(3, '0')}`
}
