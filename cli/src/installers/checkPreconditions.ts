import type { HostContext } from './types.js'
import { ProvisionError, ProvisionErrorCode } from './errors.js'
import { hasVirtualizationFlags } from './probes.js'
import { requireConfirmation } from './prompts.js'
import { detectPackageManager } from './utils.js'

export async function checkPreconditions(ctx: HostContext): Promise<void> {
  if (await hasVirtualizationFlags(ctx)) {
    ctx.logger.ok('CPU virtualization flags present (vmx/svm)')
  } else {
    ctx.logger.warn('CPU virtualization flags (vmx/svm) not found; KVM acceleration may not work on this host')
    await requireConfirmation(
      ctx,
      'Continue without hardware virtualization support?',
      'Aborted: CPU virtualization support is missing'
    )
  }

  const pm = await detectPackageManager()
  if (pm === 'none') {
    throw new ProvisionError(
      ProvisionErrorCode.NO_PACKAGE_MANAGER,
      'apt-get/dpkg-query not found; only Debian/Ubuntu hosts are supported'
    )
  }
  ctx.logger.info(`Detected package manager: ${pm}`)
}
