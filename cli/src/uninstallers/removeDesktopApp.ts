import type { UninstallerContext } from '../installers/types.js'
import { DESKTOP_APP_BIN } from '../installers/paths.js'
import { installedPackages } from '../installers/probes.js'
import { removePath, runPrivileged } from '../installers/utils.js'
import { stopProcesses } from './stopProcesses.js'

export async function removeDesktopApp(ctx: UninstallerContext): Promise<void> {
  await stopProcesses(ctx, DESKTOP_APP_BIN, 'Idle Finance')

  if ((await installedPackages([DESKTOP_APP_BIN])).has(DESKTOP_APP_BIN)) {
    await runPrivileged(ctx, 'apt-get', ['purge', '-y', DESKTOP_APP_BIN])
    ctx.logger.ok('Idle Finance package purged')
  }

  const { paths } = ctx
  let removed = 0
  for (const target of [paths.appImageBin, paths.desktopEntry, ...paths.desktopAppKnownPaths, ...paths.desktopAppData]) {
    if (await removePath(ctx, target)) removed++
  }
  ctx.logger.ok(removed > 0 ? `Removed ${removed} Idle Finance file(s)` : 'No Idle Finance files left to remove')
}
