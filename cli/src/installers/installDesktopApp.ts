import * as path from 'path'
import type { DesktopAppFormat, DesktopAppInstallation, InstallerContext, InstallerOptions } from './types.js'
import { ProvisionError, ProvisionErrorCode, errorMessage, isProvisionError } from './errors.js'
import { DESKTOP_APP_BIN } from './paths.js'
import { desktopAppInstallation } from './probes.js'
import { requireConfirmation, selectDesktopFormat } from './prompts.js'
import { download, renderTemplate, runPrivileged, withScratchDir, writeSystemFile } from './utils.js'

export function desktopAppAssets(options: InstallerOptions): Record<DesktopAppFormat, { file: string; url: string }> {
  const v = options.desktopAppVersion
  const base = `${options.desktopAppReleaseUrl.replace(/\/+$/, '')}/v${v}`
  const deb = `${DESKTOP_APP_BIN}_${v}_amd64.deb`
  const appimage = `${DESKTOP_APP_BIN}-${v}.AppImage`
  return {
    deb: { file: deb, url: `${base}/${deb}` },
    appimage: { file: appimage, url: `${base}/${appimage}` }
  }
}

/**
 * Installs the Idle Finance desktop app. The .deb is tried first unless the
 * AppImage is preferred; a failed package install falls back to the AppImage
 * once. A failed download is fatal with no fallback.
 */
export async function installDesktopApp(ctx: InstallerContext): Promise<DesktopAppInstallation> {
  if (!ctx.options.installDesktopApp) {
    ctx.logger.info('Desktop app install disabled; skipping')
    return desktopAppInstallation(ctx)
  }

  const current = await desktopAppInstallation(ctx)
  if (current !== 'missing') {
    ctx.logger.ok(`Idle Finance already installed (${current})`)
    return current
  }

  const format = ctx.options.desktopAppFormat ?? (await selectDesktopFormat(ctx))
  await requireConfirmation(
    ctx,
    `Install Idle Finance ${ctx.options.desktopAppVersion} (${format})?`,
    'Aborted: desktop app was not installed'
  )

  if (format === 'deb') {
    try {
      await installDeb(ctx)
      ctx.logger.ok('Idle Finance installed from .deb package')
      return 'package'
    } catch (error) {
      if (!isProvisionError(error, ProvisionErrorCode.INSTALL_FAILED)) throw error
      ctx.logger.warn(`${error.message}; falling back to AppImage`)
    }
  }

  await installAppImage(ctx)
  ctx.logger.ok(`Idle Finance installed as AppImage at ${ctx.paths.appImageBin}`)
  return 'portable-image'
}

async function installDeb(ctx: InstallerContext): Promise<void> {
  const asset = desktopAppAssets(ctx.options).deb
  await withScratchDir('golem-host-deb-', async (dir) => {
    const file = path.join(dir, asset.file)
    await download(ctx, asset.url, file)
    try {
      await runPrivileged(ctx, 'apt-get', ['install', '-y', file])
    } catch (error) {
      throw new ProvisionError(ProvisionErrorCode.INSTALL_FAILED, `Package install failed: ${errorMessage(error)}`)
    }
  })
}

async function installAppImage(ctx: InstallerContext): Promise<void> {
  const asset = desktopAppAssets(ctx.options).appimage
  await withScratchDir('golem-host-appimage-', async (dir) => {
    const file = path.join(dir, asset.file)
    await download(ctx, asset.url, file)
    try {
      // install(1) marks it executable and moves it into place in one step.
      await runPrivileged(ctx, 'install', ['-m', '0755', file, ctx.paths.appImageBin])
    } catch (error) {
      throw new ProvisionError(ProvisionErrorCode.INSTALL_FAILED, `AppImage install failed: ${errorMessage(error)}`)
    }
  })
  const entry = await renderTemplate(ctx.rootDir, 'idle-finance.desktop', {
    EXEC: ctx.paths.appImageBin,
    VERSION: ctx.options.desktopAppVersion
  })
  await writeSystemFile(ctx, ctx.paths.desktopEntry, entry)
  ctx.logger.info(`Desktop entry written to ${ctx.paths.desktopEntry}`)
}
