import { promises as fs } from 'fs'
import { tmpdir } from 'os'
import { dirname, join, resolve } from 'path'
import { fileURLToPath } from 'url'
import { vi } from 'vitest'
import { resolveHostPaths } from '../src/installers/paths.js'
import type { CaptureResult } from '../src/installers/exec.js'
import type {
  BaseOptions,
  HostContext,
  HostPaths,
  InstallerOptions,
  Logger,
  UninstallerOptions
} from '../src/installers/types.js'

export const repoRoot = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..')
export const USER = 'tester'
export const UDEV_RULE_0666 = 'KERNEL=="kvm", GROUP="kvm", MODE="0666"\n'

export interface FakeLogger extends Logger {
  log: ReturnType<typeof vi.fn>
  info: ReturnType<typeof vi.fn>
  ok: ReturnType<typeof vi.fn>
  warn: ReturnType<typeof vi.fn>
  err: ReturnType<typeof vi.fn>
}

export function fakeLogger(): FakeLogger {
  return { log: vi.fn(), info: vi.fn(), ok: vi.fn(), warn: vi.fn(), err: vi.fn() }
}

export async function makeHostDir(label: string): Promise<string> {
  return fs.mkdtemp(join(tmpdir(), `golem-host-test-${label}-`))
}

/** Host paths with every system location moved under `td`. */
export function hostPaths(td: string): HostPaths {
  const home = join(td, 'home')
  return resolveHostPaths(home, {
    cpuinfo: join(td, 'proc', 'cpuinfo'),
    procModules: join(td, 'proc', 'modules'),
    bootModules: join(td, 'etc', 'modules'),
    devKvm: join(td, 'dev', 'kvm'),
    groupFile: join(td, 'etc', 'group'),
    udevRule: join(td, 'etc', 'udev', 'rules.d', '60-kvm.rules'),
    appImageBin: join(td, 'usr', 'local', 'bin', 'idle-finance'),
    desktopAppKnownPaths: [join(td, 'usr', 'bin', 'idle-finance'), join(td, 'opt', 'idle-finance')],
    desktopAppData: [join(home, '.config', 'idle-finance')],
    providerBinaries: [join(home, '.local', 'bin', 'golemsp'), join(td, 'usr', 'local', 'bin', 'golemsp')],
    systemdDir: join(td, 'etc', 'systemd', 'system'),
    serviceDirs: [join(td, 'opt', 'idle-finance-automation')],
    staleAptSources: [join(td, 'etc', 'apt', 'sources.list.d', 'golem.list')]
  })
}

export function installerOptions(overrides: Partial<InstallerOptions> = {}): InstallerOptions {
  return {
    user: USER,
    requiredPackages: ['A', 'B'],
    autoConfirm: true,
    dryRun: false,
    nodeName: 'test-node',
    walletAddress: '',
    nonInteractive: true,
    installDesktopApp: true,
    desktopAppVersion: '2.0.0',
    desktopAppFormat: 'deb',
    desktopAppReleaseUrl: 'https://releases.example.test/download',
    providerInstallerUrl: 'https://join.golem.network/as-provider',
    providerPrice: '0.1',
    providerTelemetry: 'deny',
    deviceMode: 0o666,
    settleDelayMs: 0,
    ...overrides
  }
}

export function uninstallerOptions(overrides: Partial<UninstallerOptions> = {}): UninstallerOptions {
  return { user: USER, requiredPackages: ['A', 'B'], autoConfirm: true, dryRun: false, keepPath: false, ...overrides }
}

export function makeCtx<O extends BaseOptions>(td: string, options: O, logger: Logger = fakeLogger()): HostContext<O> {
  return {
    cwd: td,
    homeDir: join(td, 'home'),
    rootDir: repoRoot,
    logDir: td,
    logFile: join(td, 'log.txt'),
    options,
    logger,
    paths: hostPaths(td),
    useSudo: false
  }
}

export async function writeHostFile(file: string, content: string): Promise<void> {
  await fs.mkdir(dirname(file), { recursive: true })
  await fs.writeFile(file, content, 'utf8')
}

export async function countLines(file: string, line: string): Promise<number> {
  return (await fs.readFile(file, 'utf8')).split('\n').filter((l) => l === line).length
}

/** Seeds a host on which every KVM check already holds (Intel CPU, mode 0666). */
export async function seedConfiguredHost(td: string): Promise<void> {
  const paths = hostPaths(td)
  await writeHostFile(paths.cpuinfo, 'vendor_id\t: GenuineIntel\nflags\t\t: fpu vmx sse2\n')
  await writeHostFile(paths.procModules, 'kvm_intel 372736 0 - Live 0x0\nkvm 1032192 1 kvm_intel, Live 0x0\n')
  await writeHostFile(paths.bootModules, 'kvm\nkvm_intel\n')
  await writeHostFile(paths.devKvm, '')
  await fs.chmod(paths.devKvm, 0o666)
  const { gid } = await fs.stat(paths.devKvm)
  await writeHostFile(paths.groupFile, `kvm:x:${gid}:${USER}\n`)
  await writeHostFile(paths.udevRule, UDEV_RULE_0666)
}

/**
 * captureCommand stand-in answering dpkg-query for the given installed
 * packages; `provides` maps a package to its Provides field.
 */
export function dpkgReporting(installed: () => string[], provides: Record<string, string> = {}) {
  return async (cmd: string): Promise<CaptureResult> => {
    if (cmd !== 'dpkg-query') return { stdout: '', code: 1 }
    const lines = installed().map((p) => `${p}|install ok installed|${provides[p] ?? ''}\n`)
    return { stdout: ['zsh|deinstall ok config-files|\n', ...lines].join(''), code: 0 }
  }
}
