import * as path from 'path'
import fs from 'fs-extra'
import type { UninstallerContext } from '../installers/types.js'
import { SERVICE_UNITS } from '../installers/paths.js'
import { unitActive } from '../installers/probes.js'
import { bestEffort, removePath, runPrivileged } from '../installers/utils.js'

/** Stops and deletes the automation/backend systemd units and their directories. */
export async function removeServices(ctx: UninstallerContext): Promise<void> {
  let unitsRemoved = 0
  for (const unit of SERVICE_UNITS) {
    if (await unitActive(unit)) {
      await bestEffort(ctx, `Stopping ${unit}`, () => runPrivileged(ctx, 'systemctl', ['stop', unit]))
    }
    const unitFile = path.join(ctx.paths.systemdDir, unit)
    if (await fs.pathExists(unitFile)) {
      await bestEffort(ctx, `Disabling ${unit}`, () => runPrivileged(ctx, 'systemctl', ['disable', unit]))
      await removePath(ctx, unitFile)
      unitsRemoved++
    }
  }

  for (const dir of ctx.paths.serviceDirs) await removePath(ctx, dir)

  if (unitsRemoved > 0) {
    await runPrivileged(ctx, 'systemctl', ['daemon-reload'])
    await bestEffort(ctx, 'systemctl reset-failed', () => runPrivileged(ctx, 'systemctl', ['reset-failed']))
    ctx.logger.ok(`Removed ${unitsRemoved} service unit(s)`)
  } else {
    ctx.logger.ok('No automation services installed')
  }
}
