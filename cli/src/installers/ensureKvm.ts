import type { InstallerContext, PendingAction } from './types.js'
import { KVM_GROUP } from './paths.js'
import {
  bootModuleLines,
  cpuVendorModule,
  deviceNodeState,
  isGroupMember,
  loadedModules,
  readUdevRule
} from './probes.js'
import { requireConfirmation } from './prompts.js'
import { appendMissingLines, bestEffort, modeString, renderTemplate, runPrivileged, writeSystemFile } from './utils.js'

export type KvmActionId = 'load-module' | 'boot-persistence' | 'device-node' | 'permissions'

const KVM_MAJOR = '10'
const KVM_MINOR = '232'

export async function expectedUdevRule(ctx: InstallerContext): Promise<string> {
  return renderTemplate(ctx.rootDir, '60-kvm.rules', { GROUP: KVM_GROUP, MODE: modeString(ctx.options.deviceMode) })
}

/**
 * Evaluates the four KVM checks once and returns the actions still needed.
 * An empty list means the host is already configured.
 */
export async function planKvmActions(ctx: InstallerContext): Promise<PendingAction<KvmActionId>[]> {
  const { paths, options } = ctx
  const actions: PendingAction<KvmActionId>[] = []
  const vendorModule = await cpuVendorModule(ctx)
  const wanted = vendorModule ? ['kvm', vendorModule] : ['kvm']

  const loaded = await loadedModules(ctx)
  if (wanted.some((m) => !loaded.has(m))) {
    const target = vendorModule ?? 'kvm'
    actions.push({
      id: 'load-module',
      description: `load kernel module ${target}`,
      apply: () => runPrivileged(ctx, 'modprobe', [target])
    })
  }

  const bootLines = await bootModuleLines(ctx)
  const unpersisted = wanted.filter((m) => !bootLines.includes(m))
  if (unpersisted.length > 0) {
    actions.push({
      id: 'boot-persistence',
      description: `add ${unpersisted.join(', ')} to ${paths.bootModules}`,
      apply: async () => {
        // Re-checked at write time; only absent lines are appended.
        await appendMissingLines(ctx, paths.bootModules, unpersisted)
      }
    })
  }

  const device = await deviceNodeState(ctx)
  if (!device.exists) {
    actions.push({
      id: 'device-node',
      description: `create ${paths.devKvm}`,
      apply: () => runPrivileged(ctx, 'mknod', [paths.devKvm, 'c', KVM_MAJOR, KVM_MINOR])
    })
  }

  const rule = await expectedUdevRule(ctx)
  const permissionsHold = device.exists
    && device.group === KVM_GROUP
    && device.mode === options.deviceMode
    && (await isGroupMember(ctx, KVM_GROUP, options.user))
    && (await readUdevRule(ctx)) === rule
  if (!permissionsHold) {
    actions.push({
      id: 'permissions',
      description: `grant ${KVM_GROUP} group access to ${paths.devKvm} (mode ${modeString(options.deviceMode)})`,
      apply: () => enforcePermissions(ctx, rule)
    })
  }

  return actions
}

// Sets the full target state regardless of which checks failed.
async function enforcePermissions(ctx: InstallerContext, rule: string): Promise<void> {
  const { paths, options } = ctx
  await runPrivileged(ctx, 'groupadd', ['-f', KVM_GROUP])
  await runPrivileged(ctx, 'chown', [`root:${KVM_GROUP}`, paths.devKvm])
  await runPrivileged(ctx, 'chmod', [modeString(options.deviceMode), paths.devKvm])
  if (!(await isGroupMember(ctx, KVM_GROUP, options.user))) {
    await runPrivileged(ctx, 'usermod', ['-aG', KVM_GROUP, options.user])
    ctx.logger.warn(`Added ${options.user} to '${KVM_GROUP}'; log out and back in for it to take effect`)
  }
  await writeSystemFile(ctx, paths.udevRule, rule)
  await bestEffort(ctx, 'Reloading udev rules', async () => {
    await runPrivileged(ctx, 'udevadm', ['control', '--reload-rules'])
    await runPrivileged(ctx, 'udevadm', ['trigger', '--name-match=kvm'])
  })
}

export async function ensureKvm(ctx: InstallerContext): Promise<KvmActionId[]> {
  const actions = await planKvmActions(ctx)
  if (actions.length === 0) {
    ctx.logger.ok('KVM already configured')
    return []
  }

  for (const action of actions) ctx.logger.info(`Pending: ${action.description}`)
  await requireConfirmation(ctx, `Apply ${actions.length} KVM change(s)?`, 'Aborted: KVM setup was not applied')

  for (const action of actions) {
    await action.apply()
    ctx.logger.ok(`Done: ${action.description}`)
  }
  return actions.map((a) => a.id)
}
