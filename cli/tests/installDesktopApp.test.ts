import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { promises as fs } from 'fs'
import * as p from '@clack/prompts'
import { desktopAppAssets, installDesktopApp } from '../src/installers/installDesktopApp.js'
import { captureCommand, needCmd, runCommand } from '../src/installers/exec.js'
import { dpkgReporting, fakeLogger, installerOptions, makeCtx, makeHostDir, writeHostFile } from './helpers.js'

vi.mock('../src/installers/exec.js', async () => {
  const actual = await vi.importActual<typeof import('../src/installers/exec.js')>('../src/installers/exec.js')
  return {
    ...actual,
    runCommand: vi.fn(async () => {}),
    needCmd: vi.fn(async () => false),
    captureCommand: vi.fn(async () => ({ stdout: '', code: 1 }))
  }
})

vi.mock('@clack/prompts', () => ({
  confirm: vi.fn(async () => true),
  isCancel: () => false,
  select: vi.fn(async () => 'appimage')
}))

const DEB_URL = 'https://releases.example.test/download/v2.0.0/idle-finance_2.0.0_amd64.deb'
const APPIMAGE_URL = 'https://releases.example.test/download/v2.0.0/idle-finance-2.0.0.AppImage'

let td = ''
beforeEach(async () => {
  vi.clearAllMocks()
  vi.mocked(needCmd).mockImplementation(async () => false)
  vi.mocked(runCommand).mockImplementation(async () => {})
  vi.mocked(captureCommand).mockImplementation(dpkgReporting(() => []))
  td = await makeHostDir('desktop')
})
afterEach(async () => { await fs.rm(td, { recursive: true, force: true }) })

function commandNames(): string[] {
  return vi.mocked(runCommand).mock.calls.map(([cmd, args]) => (cmd === 'curl' ? `curl ${args[3]}` : `${cmd} ${args[0]}`))
}

describe('desktopAppAssets', () => {
  it('builds versioned asset URLs and tolerates a trailing slash on the base', () => {
    const assets = desktopAppAssets(installerOptions({ desktopAppReleaseUrl: 'https://releases.example.test/download/' }))
    expect(assets.deb).toEqual({ file: 'idle-finance_2.0.0_amd64.deb', url: DEB_URL })
    expect(assets.appimage).toEqual({ file: 'idle-finance-2.0.0.AppImage', url: APPIMAGE_URL })
  })
})

describe('installDesktopApp', () => {
  it('installs the .deb when the package install succeeds', async () => {
    const ctx = makeCtx(td, installerOptions())

    expect(await installDesktopApp(ctx)).toBe('package')
    expect(commandNames()).toEqual([`curl ${DEB_URL}`, 'apt-get install'])
  })

  it('falls back to the AppImage exactly once when the .deb install fails', async () => {
    vi.mocked(runCommand).mockImplementation(async (cmd) => {
      if (cmd === 'apt-get') throw new Error('Command failed (100): apt-get install -y')
    })
    const logger = fakeLogger()
    const ctx = makeCtx(td, installerOptions(), logger)

    expect(await installDesktopApp(ctx)).toBe('portable-image')
    expect(commandNames()).toEqual([`curl ${DEB_URL}`, 'apt-get install', `curl ${APPIMAGE_URL}`, 'install -m'])
    expect(logger.warn).toHaveBeenCalledWith(
      'Package install failed: Command failed (100): apt-get install -y; falling back to AppImage'
    )
  })

  it('writes a desktop entry pointing at the installed AppImage', async () => {
    const ctx = makeCtx(td, installerOptions({ desktopAppFormat: 'appimage' }))

    expect(await installDesktopApp(ctx)).toBe('portable-image')
    expect(commandNames()).toEqual([`curl ${APPIMAGE_URL}`, 'install -m'])
    const entry = await fs.readFile(ctx.paths.desktopEntry, 'utf8')
    expect(entry.split('\n')).toContain(`Exec=${ctx.paths.appImageBin} %U`)
    expect(entry.split('\n')).toContain('Comment=Idle Finance desktop app 2.0.0')
  })

  it('treats a failed download as fatal without falling back', async () => {
    vi.mocked(runCommand).mockImplementation(async (cmd) => {
      if (cmd === 'curl') throw new Error('Command failed (6): curl')
    })
    const ctx = makeCtx(td, installerOptions())

    await expect(installDesktopApp(ctx)).rejects.toMatchObject({
      code: 'DOWNLOAD_FAILED',
      message: `Download failed: ${DEB_URL}. Check your network connection and re-run the command to retry.`
    })
    expect(commandNames()).toEqual([`curl ${DEB_URL}`])
  })

  it('skips without asking when an AppImage is already in place', async () => {
    const ctx = makeCtx(td, installerOptions({ autoConfirm: false }))
    await writeHostFile(ctx.paths.appImageBin, '')

    expect(await installDesktopApp(ctx)).toBe('portable-image')
    expect(p.confirm).not.toHaveBeenCalled()
    expect(runCommand).not.toHaveBeenCalled()
  })

  it('skips when dpkg reports the package as installed', async () => {
    vi.mocked(captureCommand).mockImplementation(dpkgReporting(() => ['idle-finance']))
    const ctx = makeCtx(td, installerOptions())

    expect(await installDesktopApp(ctx)).toBe('package')
    expect(runCommand).not.toHaveBeenCalled()
  })

  it('asks for the format when none is configured', async () => {
    const ctx = makeCtx(td, installerOptions({ autoConfirm: false, desktopAppFormat: undefined }))

    expect(await installDesktopApp(ctx)).toBe('portable-image')
    expect(p.select).toHaveBeenCalledTimes(1)
    expect(commandNames()).toEqual([`curl ${APPIMAGE_URL}`, 'install -m'])
  })

  it('does nothing when disabled', async () => {
    const ctx = makeCtx(td, installerOptions({ installDesktopApp: false }))

    expect(await installDesktopApp(ctx)).toBe('missing')
    expect(runCommand).not.toHaveBeenCalled()
  })

  it('stops when the install is declined', async () => {
    vi.mocked(p.confirm).mockResolvedValueOnce(false)
    const ctx = makeCtx(td, installerOptions({ autoConfirm: false }))

    await expect(installDesktopApp(ctx)).rejects.toMatchObject({ code: 'DECLINED' })
    expect(runCommand).not.toHaveBeenCalled()
  })
})
