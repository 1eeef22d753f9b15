import fs from 'fs-extra'
import * as path from 'path'
import { captureCommand, needCmd } from './exec.js'
import { readLines } from './utils.js'
import { DESKTOP_APP_BIN, PROVIDER_BIN } from './paths.js'
import type { DesktopAppInstallation, HostContext } from './types.js'

// Every probe reads the host afresh; nothing here is cached between steps.

export type VendorModule = 'kvm_intel' | 'kvm_amd'

async function readCpuInfo(ctx: HostContext): Promise<string> {
  if (!(await fs.pathExists(ctx.paths.cpuinfo))) return ''
  return fs.readFile(ctx.paths.cpuinfo, 'utf8')
}

export async function hasVirtualizationFlags(ctx: HostContext): Promise<boolean> {
  return /^flags\s*:.*\b(vmx|svm)\b/m.test(await readCpuInfo(ctx))
}

export async function cpuVendorModule(ctx: HostContext): Promise<VendorModule | undefined> {
  const vendor = /^vendor_id\s*:\s*(\S+)/m.exec(await readCpuInfo(ctx))?.[1]
  if (vendor === 'GenuineIntel') return 'kvm_intel'
  if (vendor === 'AuthenticAMD') return 'kvm_amd'
  return undefined
}

export async function loadedModules(ctx: HostContext): Promise<Set<string>> {
  const lines = await readLines(ctx.paths.procModules)
  return new Set(lines.map((l) => l.split(/\s+/)[0]).filter((name): name is string => Boolean(name)))
}

export async function bootModuleLines(ctx: HostContext): Promise<string[]> {
  return (await readLines(ctx.paths.bootModules)).map((l) => l.trim()).filter((l) => l !== '' && !l.startsWith('#'))
}

/**
 * Names from `names` that dpkg reports as installed, either as a package of
 * that name or as a virtual name listed in an installed package's Provides
 * (`qemu-kvm` is provided by `qemu-system-x86` on current releases).
 */
export async function installedPackages(names: string[]): Promise<Set<string>> {
  const installed = new Set<string>()
  if (names.length === 0) return installed
  const wanted = new Set(names)
  const { stdout } = await captureCommand('dpkg-query', ['-W', '-f=${Package}|${Status}|${Provides}\\n'])
  for (const line of stdout.split('\n')) {
    const [pkg, status, provides = ''] = line.trim().split('|')
    if (!pkg || status !== 'install ok installed') continue
    // Provides reads like "qemu-kvm (= 1:8.2.2), foo"
    const virtual = provides.split(',').map((entry) => entry.trim().split(/\s+/)[0])
    for (const name of [pkg, ...virtual]) {
      if (name && wanted.has(name)) installed.add(name)
    }
  }
  return installed
}

export interface GroupEntry {
  name: string
  gid: number
  members: string[]
}

export async function readGroups(ctx: HostContext): Promise<Map<string, GroupEntry>> {
  const groups = new Map<string, GroupEntry>()
  for (const line of await readLines(ctx.paths.groupFile)) {
    const [name, , gid, members] = line.split(':')
    if (!name || gid === undefined) continue
    groups.set(name, {
      name,
      gid: Number(gid),
      members: (members ?? '').split(',').map((m) => m.trim()).filter(Boolean)
    })
  }
  return groups
}

export async function isGroupMember(ctx: HostContext, group: string, user: string): Promise<boolean> {
  return (await readGroups(ctx)).get(group)?.members.includes(user) ?? false
}

export interface DeviceNodeState {
  exists: boolean
  group?: string
  mode?: number
}

export async function deviceNodeState(ctx: HostContext): Promise<DeviceNodeState> {
  if (!(await fs.pathExists(ctx.paths.devKvm))) return { exists: false }
  const stat = await fs.stat(ctx.paths.devKvm)
  const group = [...(await readGroups(ctx)).values()].find((g) => g.gid === stat.gid)?.name
  return { exists: true, group: group ?? String(stat.gid), mode: stat.mode & 0o777 }
}

export async function readUdevRule(ctx: HostContext): Promise<string | undefined> {
  if (!(await fs.pathExists(ctx.paths.udevRule))) return undefined
  return fs.readFile(ctx.paths.udevRule, 'utf8')
}

export async function providerInstalled(ctx: HostContext): Promise<boolean> {
  if (await needCmd(PROVIDER_BIN)) return true
  return fs.pathExists(path.join(ctx.paths.localBin, PROVIDER_BIN))
}

export async function desktopAppInstallation(ctx: HostContext): Promise<DesktopAppInstallation> {
  if ((await installedPackages([DESKTOP_APP_BIN])).has(DESKTOP_APP_BIN)) return 'package'
  if (await fs.pathExists(ctx.paths.appImageBin)) return 'portable-image'
  for (const known of ctx.paths.desktopAppKnownPaths) {
    if (await fs.pathExists(known)) return 'package'
  }
  // Origin unknown; counted as a package install so it is left alone.
  if (await needCmd(DESKTOP_APP_BIN)) return 'package'
  return 'missing'
}

/**
 * PIDs whose command line matches `pattern`. This process and its parent are
 * left out: run from a checkout under a path containing the pattern, their
 * own command lines match too.
 */
export async function matchingPids(pattern: string): Promise<number[]> {
  const { stdout, code } = await captureCommand('pgrep', ['-f', pattern])
  if (code !== 0) return []
  const self = new Set([process.pid, process.ppid])
  return stdout
    .split('\n')
    .map((line) => Number(line.trim()))
    .filter((pid) => Number.isInteger(pid) && pid > 0 && !self.has(pid))
}

export async function processRunning(pattern: string): Promise<boolean> {
  return (await matchingPids(pattern)).length > 0
}

export async function unitActive(unit: string): Promise<boolean> {
  return (await captureCommand('systemctl', ['is-active', '--quiet', unit])).code === 0
}
