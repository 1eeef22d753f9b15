import * as path from 'path'
import fs from 'fs-extra'
import type { HostContext, StatusRow } from '../installers/types.js'
import { DESKTOP_APP_BIN, KVM_GROUP, PROVIDER_BIN, SERVICE_UNITS } from '../installers/paths.js'
import {
  bootModuleLines,
  desktopAppInstallation,
  installedPackages,
  isGroupMember,
  processRunning,
  providerInstalled,
  readUdevRule,
  unitActive
} from '../installers/probes.js'

function absent(label: string, gone: boolean, goneText = 'REMOVED', presentText = 'STILL PRESENT'): StatusRow {
  return { label, ok: gone, value: gone ? goneText : presentText }
}

/** Read-only counterpart of collectStatus that asserts absence. */
export async function collectRemovalStatus(ctx: HostContext): Promise<StatusRow[]> {
  const rows: StatusRow[] = []
  rows.push(absent('Idle Finance app', (await desktopAppInstallation(ctx)) === 'missing'))
  rows.push(absent('Idle Finance processes', !(await processRunning(DESKTOP_APP_BIN)), 'STOPPED', 'STILL RUNNING'))
  rows.push(absent(PROVIDER_BIN, !(await providerInstalled(ctx))))
  for (const dir of ctx.paths.providerData) rows.push(absent(dir, !(await fs.pathExists(dir))))
  for (const unit of SERVICE_UNITS) {
    rows.push(absent(unit, !(await unitActive(unit)), 'STOPPED', 'STILL RUNNING'))
    rows.push(absent(`${unit} file`, !(await fs.pathExists(path.join(ctx.paths.systemdDir, unit)))))
  }
  rows.push(absent(`Group '${KVM_GROUP}' membership`, !(await isGroupMember(ctx, KVM_GROUP, ctx.options.user)), 'REMOVED', 'STILL MEMBER'))
  const boot = await bootModuleLines(ctx)
  rows.push(absent('KVM boot modules', !boot.some((l) => l === 'kvm' || l === 'kvm_intel' || l === 'kvm_amd')))
  rows.push(absent('udev rule', (await readUdevRule(ctx)) === undefined))
  const installed = await installedPackages(ctx.options.requiredPackages)
  rows.push(absent('Required packages', installed.size === 0, 'REMOVED', `STILL INSTALLED: ${[...installed].join(', ')}`))
  return rows
}
