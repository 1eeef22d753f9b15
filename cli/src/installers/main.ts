import type { InstallerContext, InstallerOptions, StatusRow } from './types.js'
import { createContext } from './context.js'
import { checkPreconditions } from './checkPreconditions.js'
import { ensurePackages } from './ensurePackages.js'
import { ensureKvm } from './ensureKvm.js'
import { ensureShellPath } from './ensureShellPath.js'
import { installProvider } from './installProvider.js'
import { installDesktopApp } from './installDesktopApp.js'
import { printStatus } from './verify.js'

export async function runInstaller(options: InstallerOptions, rootDir: string): Promise<StatusRow[]> {
  const ctx = createContext({ command: 'install', options, rootDir })
  return runInstallSteps(ctx)
}

/** Steps run strictly in order; a fatal error from any of them ends the run. */
export async function runInstallSteps(ctx: InstallerContext): Promise<StatusRow[]> {
  if (ctx.options.dryRun) ctx.logger.info('Dry run: no changes will be made')
  else ctx.logger.info(`Logging to ${ctx.logFile}`)

  await checkPreconditions(ctx)
  await ensurePackages(ctx)
  await ensureKvm(ctx)
  await ensureShellPath(ctx)
  await installProvider(ctx)
  await installDesktopApp(ctx)

  return printStatus(ctx, 'golem-host: provisioning status')
}
