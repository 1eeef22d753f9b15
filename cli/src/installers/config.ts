import * as os from 'os'
import { ProvisionError, ProvisionErrorCode } from './errors.js'
import type { DesktopAppFormat, InstallerOptions, TelemetryChoice, UninstallerOptions } from './types.js'

type Env = Record<string, string | undefined>

export const DEFAULT_REQUIRED_PACKAGES = [
  'qemu-kvm',
  'libvirt-daemon-system',
  'libvirt-clients',
  'bridge-utils',
  'cpu-checker',
  'curl',
  'python3-venv',
  'python3-pip'
]

export const DEFAULT_PROVIDER_INSTALLER_URL = 'https://join.golem.network/as-provider'
// Release downloads live under <base>/v<version>/<asset>.
export const DEFAULT_DESKTOP_APP_RELEASE_URL = 'https://github.com/idle-finance/idle-finance-desktop/releases/download'

/** Flags given on the command line; each one wins over its environment variable. */
export interface InstallFlags {
  yes?: boolean
  dryRun?: boolean
  interactive?: boolean
  nodeName?: string
  wallet?: string
  format?: string
  appVersion?: string
  desktopApp?: boolean
}

export function loadOptions(env: Env = process.env, flags: InstallFlags = {}): InstallerOptions {
  return {
    user: currentUser(env),
    requiredPackages: parsePackageList(env.REQUIRED_PACKAGES),
    autoConfirm: flags.yes ?? normalizeBoolArg('AUTO_CONFIRM', env.AUTO_CONFIRM, false),
    dryRun: flags.dryRun ?? false,
    nodeName: nonEmpty(flags.nodeName) ?? nonEmpty(env.NODE_NAME) ?? 'idle-finance-node',
    walletAddress: (flags.wallet ?? env.WALLET_ADDRESS ?? '').trim(),
    nonInteractive: flags.interactive === undefined
      ? normalizeBoolArg('NONINTERACTIVE', env.NONINTERACTIVE, true)
      : !flags.interactive,
    installDesktopApp: flags.desktopApp ?? normalizeBoolArg('INSTALL_DESKTOP_APP', env.INSTALL_DESKTOP_APP, true),
    desktopAppVersion: nonEmpty(flags.appVersion) ?? nonEmpty(env.DESKTOP_APP_VERSION) ?? '1.0.0',
    desktopAppFormat: normalizeFormatArg(flags.format ?? env.DESKTOP_APP_FORMAT),
    desktopAppReleaseUrl: nonEmpty(env.DESKTOP_APP_RELEASE_URL) ?? DEFAULT_DESKTOP_APP_RELEASE_URL,
    providerInstallerUrl: nonEmpty(env.PROVIDER_INSTALLER_URL) ?? DEFAULT_PROVIDER_INSTALLER_URL,
    providerPrice: nonEmpty(env.PROVIDER_PRICE) ?? '0.1',
    providerTelemetry: normalizeTelemetryArg(env.PROVIDER_TELEMETRY),
    deviceMode: normalizeModeArg(env.KVM_DEVICE_MODE),
    settleDelayMs: normalizeDelayArg(env.SETTLE_DELAY_MS)
  }
}

export function loadUninstallOptions(
  env: Env = process.env,
  flags: { yes?: boolean; dryRun?: boolean; keepPath?: boolean } = {}
): UninstallerOptions {
  return {
    user: currentUser(env),
    requiredPackages: parsePackageList(env.REQUIRED_PACKAGES),
    autoConfirm: flags.yes ?? normalizeBoolArg('AUTO_CONFIRM', env.AUTO_CONFIRM, false),
    dryRun: flags.dryRun ?? false,
    keepPath: flags.keepPath ?? false
  }
}

export function normalizeBoolArg(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') return fallback
  const normalized = value.trim().toLowerCase()
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  throw invalid(`Invalid ${name} value "${value}" (use 1|0, true|false, yes|no, on|off).`)
}

export function normalizeFormatArg(value: string | undefined): DesktopAppFormat | undefined {
  if (value === undefined || value.trim() === '') return undefined
  const normalized = value.trim().toLowerCase()
  if (normalized === 'deb' || normalized === 'package') return 'deb'
  if (normalized === 'appimage' || normalized === 'portable') return 'appimage'
  throw invalid(`Invalid desktop app format "${value}" (use deb|appimage).`)
}

export function normalizeTelemetryArg(value: string | undefined): TelemetryChoice {
  if (value === undefined || value.trim() === '') return 'deny'
  const normalized = value.trim().toLowerCase()
  if (normalized === 'allow' || normalized === 'deny') return normalized
  throw invalid(`Invalid PROVIDER_TELEMETRY value "${value}" (use allow|deny).`)
}

export function normalizeModeArg(value: string | undefined): number {
  if (value === undefined || value.trim() === '') return 0o666
  const normalized = value.trim()
  if (!/^0?[0-7]{3}$/.test(normalized)) throw invalid(`Invalid KVM_DEVICE_MODE value "${value}" (octal, e.g. 0666 or 0660).`)
  return parseInt(normalized, 8)
}

export function normalizeDelayArg(value: string | undefined): number {
  if (value === undefined || value.trim() === '') return 3000
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 0) throw invalid(`Invalid SETTLE_DELAY_MS value "${value}".`)
  return parsed
}

export function parsePackageList(value: string | undefined): string[] {
  if (value === undefined || value.trim() === '') return [...DEFAULT_REQUIRED_PACKAGES]
  return value.split(/[\s,]+/).filter(Boolean)
}

function currentUser(env: Env): string {
  return nonEmpty(env.SUDO_USER) ?? nonEmpty(env.USER) ?? os.userInfo().username
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

function invalid(message: string): ProvisionError {
  return new ProvisionError(ProvisionErrorCode.INVALID_CONFIG, message)
}
