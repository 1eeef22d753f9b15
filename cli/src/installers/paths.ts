import { accessSync } from 'fs'
import { fileURLToPath } from 'url'
import { dirname, join, resolve } from 'path'
import type { HostPaths } from './types.js'

export const DESKTOP_APP_BIN = 'idle-finance'
export const PROVIDER_BIN = 'golemsp'
export const KVM_GROUP = 'kvm'
export const SERVICE_UNITS = ['idle-finance-automation.service', 'idle-finance-backend.service']

export type ProviderLogType = 'golem' | 'provider'

const PROVIDER_LOGS: Record<ProviderLogType, string[]> = {
  golem: ['.local', 'share', 'yagna', 'yagna_rCURRENT.log'],
  provider: ['.local', 'share', 'ya-provider', 'ya-provider_rCURRENT.log']
}

export function providerLogPath(homeDir: string, type: ProviderLogType): string {
  return join(homeDir, ...PROVIDER_LOGS[type])
}

const __dirname = dirname(fileURLToPath(import.meta.url))

/** Walks up (at most 6 levels) to the directory holding cli/templates. */
export function findRoot(start = __dirname): string {
  let cur = start
  for (let i = 0; i < 6; i++) {
    try {
      accessSync(resolve(cur, 'cli', 'templates', 'idle-finance.desktop'))
      return cur
    } catch {
      cur = resolve(cur, '..')
    }
  }
  return resolve(start, '..', '..', '..')
}

export function resolveHostPaths(homeDir: string, overrides: Partial<HostPaths> = {}): HostPaths {
  const localBin = join(homeDir, '.local', 'bin')
  return {
    cpuinfo: '/proc/cpuinfo',
    procModules: '/proc/modules',
    bootModules: '/etc/modules',
    devKvm: '/dev/kvm',
    groupFile: '/etc/group',
    udevRule: '/etc/udev/rules.d/60-kvm.rules',
    shellRc: join(homeDir, '.bashrc'),
    localBin,
    appImageBin: `/usr/local/bin/${DESKTOP_APP_BIN}`,
    desktopEntry: join(homeDir, '.local', 'share', 'applications', `${DESKTOP_APP_BIN}.desktop`),
    desktopAppKnownPaths: [
      `/usr/bin/${DESKTOP_APP_BIN}`,
      `/opt/${DESKTOP_APP_BIN}`,
      join(localBin, DESKTOP_APP_BIN)
    ],
    desktopAppData: [
      join(homeDir, '.config', 'idle-finance'),
      join(homeDir, '.local', 'share', 'idle-finance'),
      join(homeDir, '.cache', 'idle-finance'),
      join(homeDir, '.idle-finance'),
      join(homeDir, 'Desktop', 'idle-finance.desktop'),
      '/usr/share/applications/idle-finance.desktop',
      '/etc/idle-finance',
      '/usr/share/idle-finance'
    ],
    providerBinaries: [
      join(localBin, 'golemsp'),
      '/usr/local/bin/golemsp',
      '/usr/bin/golemsp',
      join(homeDir, '.cargo', 'bin', 'golemsp')
    ],
    providerData: [join(homeDir, '.golem')],
    systemdDir: '/etc/systemd/system',
    serviceDirs: [
      '/opt/idle-finance-automation',
      '/opt/idle-finance-backend',
      '/var/log/idle-finance-automation',
      '/var/log/idle-finance-backend',
      join(homeDir, 'idle-finance-automation'),
      join(homeDir, '.local', 'share', 'idle-finance-automation')
    ],
    staleAptSources: ['/etc/apt/sources.list.d/golem.list'],
    ...overrides
  }
}
