import type { StatusRow, UninstallerContext, UninstallerOptions } from '../installers/types.js'
import { createContext } from '../installers/context.js'
import { requireConfirmation } from '../installers/prompts.js'
import { renderStatus } from '../installers/verify.js'
import { removeDesktopApp } from './removeDesktopApp.js'
import { removeProvider } from './removeProvider.js'
import { removeServices } from './removeServices.js'
import { removeKvm } from './removeKvm.js'
import { removePackages } from './removePackages.js'
import { cleanupShellRc } from './cleanupShellRc.js'
import { collectRemovalStatus } from './verifyRemoval.js'

export async function runUninstaller(options: UninstallerOptions, rootDir: string): Promise<StatusRow[]> {
  const ctx = createContext({ command: 'uninstall', options, rootDir })
  return runUninstallSteps(ctx)
}

export async function runUninstallSteps(ctx: UninstallerContext): Promise<StatusRow[]> {
  await requireConfirmation(
    ctx,
    'Remove Idle Finance, the Golem provider, automation services, KVM setup and their packages?',
    'Uninstall aborted'
  )

  await removeDesktopApp(ctx)
  await removeProvider(ctx)
  await removeServices(ctx)
  await removeKvm(ctx)
  await removePackages(ctx)
  await cleanupShellRc(ctx)

  const rows = await collectRemovalStatus(ctx)
  process.stdout.write(renderStatus('golem-host: uninstall verification', rows))
  ctx.logger.info('Log out and back in for group changes to take effect')
  return rows
}
