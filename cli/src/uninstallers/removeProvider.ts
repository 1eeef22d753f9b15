import type { UninstallerContext } from '../installers/types.js'
import { PROVIDER_BIN } from '../installers/paths.js'
import { removePath } from '../installers/utils.js'
import { stopProcesses } from './stopProcesses.js'

export async function removeProvider(ctx: UninstallerContext): Promise<void> {
  await stopProcesses(ctx, PROVIDER_BIN, 'the Golem provider')

  let removed = 0
  for (const target of [...ctx.paths.providerData, ...ctx.paths.providerBinaries]) {
    if (await removePath(ctx, target)) removed++
  }
  ctx.logger.ok(removed > 0 ? 'Golem provider removed' : 'Golem provider not found, skipping')
}
