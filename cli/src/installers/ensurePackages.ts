import fs from 'fs-extra'
import type { HostContext } from './types.js'
import { installedPackages } from './probes.js'
import { requireConfirmation } from './prompts.js'
import { bestEffort, runPrivileged } from './utils.js'

/**
 * Installs whatever part of the required package list is missing, with a
 * single index refresh and a single batched install. Returns the packages
 * that were installed (empty when the host already satisfied the list).
 */
export async function ensurePackages(ctx: HostContext): Promise<string[]> {
  const required = ctx.options.requiredPackages
  const installed = await installedPackages(required)
  const missing = required.filter((pkg) => !installed.has(pkg))

  if (missing.length === 0) {
    ctx.logger.ok('Required packages already installed')
    return []
  }

  ctx.logger.info(`Missing packages: ${missing.join(', ')}`)
  await requireConfirmation(ctx, `Install ${missing.length} missing package(s)?`, 'Aborted: required packages were not installed')

  // A broken third-party source makes `apt-get update` fail outright.
  for (const source of ctx.paths.staleAptSources) {
    if (!(await fs.pathExists(source))) continue
    await bestEffort(ctx, `Removing stale apt source ${source}`, () => runPrivileged(ctx, 'rm', ['-f', source]))
  }

  await runPrivileged(ctx, 'apt-get', ['update', '-y'])
  await runPrivileged(ctx, 'apt-get', ['install', '-y', ...missing])
  ctx.logger.ok(`Installed: ${missing.join(', ')}`)
  return missing
}
