import type { UninstallerContext } from '../installers/types.js'
import { runCommand } from '../installers/exec.js'
import { matchingPids } from '../installers/probes.js'
import { bestEffort } from '../installers/utils.js'

/** Signals every matching process except this CLI's own. Returns whether any matched. */
export async function stopProcesses(ctx: UninstallerContext, pattern: string, label: string): Promise<boolean> {
  const pids = await matchingPids(pattern)
  if (pids.length === 0) return false
  ctx.logger.info(`Stopping ${label} (pid ${pids.join(', ')})`)
  await bestEffort(ctx, `Stopping ${label}`, () =>
    runCommand('kill', pids.map(String), { dryRun: ctx.options.dryRun, logger: ctx.logger })
  )
  return true
}
