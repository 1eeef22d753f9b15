import type { UninstallerContext } from '../installers/types.js'
import { KVM_GROUP } from '../installers/paths.js'
import { isGroupMember, loadedModules } from '../installers/probes.js'
import { bestEffort, removeLines, removePath, runPrivileged } from '../installers/utils.js'

const KVM_MODULES = ['kvm_intel', 'kvm_amd', 'kvm']

export async function removeKvm(ctx: UninstallerContext): Promise<void> {
  const { paths, options } = ctx

  if (await isGroupMember(ctx, KVM_GROUP, options.user)) {
    await bestEffort(ctx, `Removing ${options.user} from ${KVM_GROUP}`, () =>
      runPrivileged(ctx, 'gpasswd', ['-d', options.user, KVM_GROUP])
    )
  }

  const stripped = await removeLines(ctx, paths.bootModules, (line) => KVM_MODULES.includes(line.trim()))
  if (stripped > 0) ctx.logger.info(`Removed ${stripped} KVM line(s) from ${paths.bootModules}`)

  await removePath(ctx, paths.udevRule)

  // Dependents first: kvm cannot unload while kvm_intel/kvm_amd hold it.
  const loaded = await loadedModules(ctx)
  for (const mod of KVM_MODULES) {
    if (!loaded.has(mod)) continue
    await bestEffort(ctx, `Unloading ${mod}`, () => runPrivileged(ctx, 'modprobe', ['-r', mod]))
  }
  ctx.logger.ok('KVM setup removed')
}
