import type { UninstallerContext } from '../installers/types.js'
import { installedPackages } from '../installers/probes.js'
import { runPrivileged } from '../installers/utils.js'

export async function removePackages(ctx: UninstallerContext): Promise<string[]> {
  const required = ctx.options.requiredPackages
  const installed = await installedPackages(required)
  const targets = required.filter((pkg) => installed.has(pkg))
  if (targets.length === 0) {
    ctx.logger.ok('No required packages installed, skipping')
    return []
  }
  await runPrivileged(ctx, 'apt-get', ['remove', '-y', '--purge', ...targets])
  await runPrivileged(ctx, 'apt-get', ['autoremove', '-y'])
  await runPrivileged(ctx, 'apt-get', ['autoclean'])
  ctx.logger.ok(`Removed: ${targets.join(', ')}`)
  return targets
}
