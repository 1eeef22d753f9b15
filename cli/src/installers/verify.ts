import type { HostContext, StatusRow } from './types.js'
import { KVM_GROUP, PROVIDER_BIN } from './paths.js'
import {
  bootModuleLines,
  cpuVendorModule,
  desktopAppInstallation,
  deviceNodeState,
  hasVirtualizationFlags,
  installedPackages,
  isGroupMember,
  loadedModules,
  providerInstalled,
  readUdevRule
} from './probes.js'
import { detectPackageManager, modeString } from './utils.js'

/** Read-only: re-probes every host state item, in a fixed order. */
export async function collectStatus(ctx: HostContext): Promise<StatusRow[]> {
  const rows: StatusRow[] = []
  const add = (label: string, ok: boolean, value: string) => rows.push({ label, value, ok })

  const virt = await hasVirtualizationFlags(ctx)
  add('Virtualization flags', virt, virt ? 'present' : 'absent')

  const pm = await detectPackageManager()
  add('Package manager', pm !== 'none', pm)

  const required = ctx.options.requiredPackages
  const installed = await installedPackages(required)
  const missing = required.filter((p) => !installed.has(p))
  add('Required packages', missing.length === 0, missing.length === 0 ? `all ${required.length} installed` : `missing: ${missing.join(', ')}`)

  const vendor = await cpuVendorModule(ctx)
  const wanted = vendor ? ['kvm', vendor] : ['kvm']
  const loaded = await loadedModules(ctx)
  const unloaded = wanted.filter((m) => !loaded.has(m))
  add('KVM modules', unloaded.length === 0, unloaded.length === 0 ? `loaded (${wanted.join(', ')})` : `not loaded: ${unloaded.join(', ')}`)

  const boot = await bootModuleLines(ctx)
  const unpersisted = wanted.filter((m) => !boot.includes(m))
  add('Boot persistence', unpersisted.length === 0, unpersisted.length === 0 ? 'configured' : `unconfigured: ${unpersisted.join(', ')}`)

  const device = await deviceNodeState(ctx)
  add(
    ctx.paths.devKvm,
    device.exists,
    device.exists && device.mode !== undefined ? `present (group ${device.group}, mode ${modeString(device.mode)})` : 'missing'
  )

  const member = await isGroupMember(ctx, KVM_GROUP, ctx.options.user)
  add(`Group '${KVM_GROUP}'`, member, member ? `${ctx.options.user} is a member` : `${ctx.options.user} is not a member`)

  const rule = await readUdevRule(ctx)
  add('udev rule', rule !== undefined, rule !== undefined ? 'present' : 'absent')

  const provider = await providerInstalled(ctx)
  add(`Provider (${PROVIDER_BIN})`, provider, provider ? 'installed' : 'missing')

  const app = await desktopAppInstallation(ctx)
  add('Idle Finance app', app !== 'missing', app)

  return rows
}

export function renderStatus(title: string, rows: StatusRow[]): string {
  const width = Math.max(...rows.map((r) => r.label.length))
  const lines: string[] = []
  lines.push('')
  lines.push(title)
  lines.push('─'.repeat(Math.max(title.length, 32)))
  for (const row of rows) lines.push(`${row.ok ? '✓' : '✗'} ${row.label.padEnd(width)}  ${row.value}`)
  lines.push('')
  return lines.join('\n') + '\n'
}

export async function printStatus(ctx: HostContext, title = 'golem-host: host status'): Promise<StatusRow[]> {
  const rows = await collectStatus(ctx)
  process.stdout.write(renderStatus(title, rows))
  return rows
}
