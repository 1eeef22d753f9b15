export type PackageManager = 'apt' | 'none'
export type DesktopAppFormat = 'deb' | 'appimage'
export type TelemetryChoice = 'allow' | 'deny'
export type DesktopAppInstallation = 'package' | 'portable-image' | 'missing'

export interface BaseOptions {
  user: string
  requiredPackages: string[]
  autoConfirm: boolean
  dryRun: boolean
}

export interface InstallerOptions extends BaseOptions {
  nodeName: string
  walletAddress: string
  nonInteractive: boolean
  installDesktopApp: boolean
  desktopAppVersion: string
  desktopAppFormat: DesktopAppFormat | undefined // undefined: ask
  desktopAppReleaseUrl: string
  providerInstallerUrl: string
  providerPrice: string
  providerTelemetry: TelemetryChoice
  deviceMode: number
  settleDelayMs: number
}

export interface UninstallerOptions extends BaseOptions {
  keepPath: boolean
}

/**
 * Every location the installers read or write. Resolved once per run from the
 * home directory so tests can point the whole host at a scratch tree.
 */
export interface HostPaths {
  cpuinfo: string
  procModules: string
  bootModules: string
  devKvm: string
  groupFile: string
  udevRule: string
  shellRc: string
  localBin: string
  appImageBin: string
  desktopEntry: string
  desktopAppKnownPaths: string[]
  desktopAppData: string[]
  providerBinaries: string[]
  providerData: string[]
  systemdDir: string
  serviceDirs: string[]
  staleAptSources: string[]
}

export interface HostContext<O extends BaseOptions = BaseOptions> {
  cwd: string
  homeDir: string
  rootDir: string
  logDir: string
  logFile: string
  options: O
  logger: Logger
  paths: HostPaths
  useSudo: boolean
}

export type InstallerContext = HostContext<InstallerOptions>
export type UninstallerContext = HostContext<UninstallerOptions>

export interface PendingAction<Id extends string = string> {
  id: Id
  description: string
  apply: () => Promise<void>
}

export interface StatusRow {
  label: string
  value: string
  ok: boolean
}

export interface Logger {
  log: (msg: string) => void
  info: (msg: string) => void
  ok: (msg: string) => void
  warn: (msg: string) => void
  err: (msg: string) => void
}
