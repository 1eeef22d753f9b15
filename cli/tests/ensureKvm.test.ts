import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { promises as fs } from 'fs'
import * as p from '@clack/prompts'
import { ensureKvm, planKvmActions } from '../src/installers/ensureKvm.js'
import { runCommand } from '../src/installers/exec.js'
import {
  USER,
  UDEV_RULE_0666,
  countLines,
  installerOptions,
  makeCtx,
  makeHostDir,
  seedConfiguredHost,
  writeHostFile
} from './helpers.js'

vi.mock('../src/installers/exec.js', async () => {
  const actual = await vi.importActual<typeof import('../src/installers/exec.js')>('../src/installers/exec.js')
  return { ...actual, runCommand: vi.fn(async () => {}) }
})

vi.mock('@clack/prompts', () => ({
  confirm: vi.fn(async () => true),
  isCancel: () => false,
  select: vi.fn()
}))

let td = ''
beforeEach(async () => {
  vi.clearAllMocks()
  td = await makeHostDir('kvm')
})
afterEach(async () => { await fs.rm(td, { recursive: true, force: true }) })

function commandLines(): string[] {
  return vi.mocked(runCommand).mock.calls.map(([cmd, args]) => [cmd, ...args].join(' '))
}

describe('ensureKvm', () => {
  it('is a no-op without confirmation when every check already holds', async () => {
    await seedConfiguredHost(td)
    const ctx = makeCtx(td, installerOptions({ autoConfirm: false }))

    expect(await ensureKvm(ctx)).toEqual([])
    expect(runCommand).not.toHaveBeenCalled()
    expect(p.confirm).not.toHaveBeenCalled()
    expect(ctx.logger.ok).toHaveBeenCalledWith('KVM already configured')
  })

  it('never duplicates a boot module line that is already present', async () => {
    await seedConfiguredHost(td)
    const ctx = makeCtx(td, installerOptions())
    await writeHostFile(ctx.paths.bootModules, 'kvm\n')

    expect(await ensureKvm(ctx)).toEqual(['boot-persistence'])
    expect(await fs.readFile(ctx.paths.bootModules, 'utf8')).toBe('kvm\nkvm_intel\n')
    expect(await countLines(ctx.paths.bootModules, 'kvm')).toBe(1)

    expect(await ensureKvm(ctx)).toEqual([])
    expect(await countLines(ctx.paths.bootModules, 'kvm')).toBe(1)
    expect(runCommand).not.toHaveBeenCalled()
  })

  it('plans and applies every action on a bare AMD host', async () => {
    const ctx = makeCtx(td, installerOptions())
    await writeHostFile(ctx.paths.cpuinfo, 'vendor_id\t: AuthenticAMD\nflags\t\t: fpu svm\n')
    await writeHostFile(ctx.paths.groupFile, 'users:x:100:\n')

    expect(await ensureKvm(ctx)).toEqual(['load-module', 'boot-persistence', 'device-node', 'permissions'])
    expect(commandLines()).toEqual([
      'modprobe kvm_amd',
      `mknod ${ctx.paths.devKvm} c 10 232`,
      'groupadd -f kvm',
      `chown root:kvm ${ctx.paths.devKvm}`,
      `chmod 0666 ${ctx.paths.devKvm}`,
      `usermod -aG kvm ${USER}`,
      'udevadm control --reload-rules',
      'udevadm trigger --name-match=kvm'
    ])
    expect(await fs.readFile(ctx.paths.bootModules, 'utf8')).toBe('kvm\nkvm_amd\n')
    expect(await fs.readFile(ctx.paths.udevRule, 'utf8')).toBe(UDEV_RULE_0666)
  })

  it('loads and persists only kvm when the CPU vendor is not recognised', async () => {
    await seedConfiguredHost(td)
    const ctx = makeCtx(td, installerOptions())
    await writeHostFile(ctx.paths.cpuinfo, 'vendor_id\t: HygonGenuine\nflags\t\t: fpu svm\n')
    await writeHostFile(ctx.paths.procModules, '')
    await writeHostFile(ctx.paths.bootModules, '')

    expect(await ensureKvm(ctx)).toEqual(['load-module', 'boot-persistence'])
    expect(commandLines()).toEqual(['modprobe kvm'])
    expect(await fs.readFile(ctx.paths.bootModules, 'utf8')).toBe('kvm\n')
  })

  it('applies a group-only device mode when configured', async () => {
    await seedConfiguredHost(td)
    const ctx = makeCtx(td, installerOptions({ deviceMode: 0o660 }))

    const actions = await planKvmActions(ctx)
    expect(actions.map((a) => a.id)).toEqual(['permissions'])
    expect(actions[0]?.description).toBe(`grant kvm group access to ${ctx.paths.devKvm} (mode 0660)`)

    await ensureKvm(ctx)
    expect(commandLines()).toContain(`chmod 0660 ${ctx.paths.devKvm}`)
    expect(commandLines()).not.toContain(`usermod -aG kvm ${USER}`)
    expect(await fs.readFile(ctx.paths.udevRule, 'utf8')).toBe('KERNEL=="kvm", GROUP="kvm", MODE="0660"\n')
  })

  it('ignores a failing udev reload', async () => {
    await seedConfiguredHost(td)
    const ctx = makeCtx(td, installerOptions())
    await fs.rm(ctx.paths.udevRule)
    vi.mocked(runCommand).mockImplementation(async (cmd) => {
      if (cmd === 'udevadm') throw new Error('Command failed (1): udevadm')
    })

    expect(await ensureKvm(ctx)).toEqual(['permissions'])
    expect(ctx.logger.warn).toHaveBeenCalledWith('Reloading udev rules failed (ignored): Command failed (1): udevadm')
    expect(await fs.readFile(ctx.paths.udevRule, 'utf8')).toBe(UDEV_RULE_0666)
  })

  it('aborts without changes when the user declines', async () => {
    vi.mocked(p.confirm).mockResolvedValueOnce(false)
    const ctx = makeCtx(td, installerOptions({ autoConfirm: false }))
    await writeHostFile(ctx.paths.cpuinfo, 'vendor_id\t: GenuineIntel\nflags\t\t: vmx\n')

    await expect(ensureKvm(ctx)).rejects.toMatchObject({ code: 'DECLINED' })
    expect(runCommand).not.toHaveBeenCalled()
    expect(await fs.access(ctx.paths.bootModules).then(() => true, () => false)).toBe(false)
  })
})
