import * as p from '@clack/prompts'
import { ProvisionError, ProvisionErrorCode } from './errors.js'
import type { DesktopAppFormat, HostContext } from './types.js'

export async function confirmStep(ctx: HostContext, message: string): Promise<boolean> {
  if (ctx.options.autoConfirm) {
    ctx.logger.info(`Auto-confirming: ${message}`)
    return true
  }
  const answer = await p.confirm({ message, initialValue: true })
  if (p.isCancel(answer)) return false
  return answer
}

/** Confirmation gate for a required step; declining is fatal. */
export async function requireConfirmation(ctx: HostContext, message: string, declined: string): Promise<void> {
  if (!(await confirmStep(ctx, message))) {
    throw new ProvisionError(ProvisionErrorCode.DECLINED, declined)
  }
}

export async function selectDesktopFormat(ctx: HostContext): Promise<DesktopAppFormat> {
  if (ctx.options.autoConfirm) return 'deb'
  const choice = await p.select({
    message: 'Idle Finance package format',
    options: [
      { label: '.deb package (falls back to AppImage on failure)', value: 'deb' },
      { label: 'AppImage (portable)', value: 'appimage' }
    ],
    initialValue: 'deb'
  })
  if (p.isCancel(choice)) {
    throw new ProvisionError(ProvisionErrorCode.DECLINED, 'Desktop app install aborted')
  }
  return choice === 'appimage' ? 'appimage' : 'deb'
}
