import * as path from 'path'
import type { InstallerContext, InstallerOptions } from './types.js'
import { runCommand, sleep, spawnInteractive } from './exec.js'
import { ProvisionError, ProvisionErrorCode, errorMessage } from './errors.js'
import { PROVIDER_BIN } from './paths.js'
import { providerInstalled } from './probes.js'
import { requireConfirmation } from './prompts.js'
import { runScriptedSession, type PromptStep } from './scriptedSession.js'
import { download, withScratchDir } from './utils.js'

// Scripted answers are only safe with a real wallet; an empty answer would
// silently accept whatever the installer defaults to.
export function useScriptedInteraction(options: Pick<InstallerOptions, 'nonInteractive' | 'walletAddress'>): boolean {
  return options.nonInteractive && options.walletAddress.trim() !== ''
}

export function providerPromptSteps(options: InstallerOptions): PromptStep[] {
  return [
    { name: 'terms', pattern: /accept the terms/i, response: 'yes' },
    { name: 'telemetry', pattern: /\[allow\/deny\]/i, response: options.providerTelemetry },
    { name: 'node name', pattern: /node name/i, response: options.nodeName },
    { name: 'wallet', pattern: /wallet address/i, response: options.walletAddress },
    { name: 'price', pattern: /price/i, response: options.providerPrice }
  ]
}

export function manualInstallHint(options: InstallerOptions): string {
  return `curl -sSf ${options.providerInstallerUrl} | bash -`
}

export async function installProvider(ctx: InstallerContext): Promise<boolean> {
  if (await providerInstalled(ctx)) {
    ctx.logger.ok(`${PROVIDER_BIN} already installed`)
    return false
  }

  await requireConfirmation(ctx, 'Install the Golem provider?', `Aborted: ${PROVIDER_BIN} was not installed`)

  await withScratchDir('golem-host-provider-', async (dir) => {
    const script = path.join(dir, 'as-provider.sh')
    await download(ctx, ctx.options.providerInstallerUrl, script)
    if (useScriptedInteraction(ctx.options)) {
      await runScriptedInstall(ctx, script)
    } else {
      ctx.logger.info('Running the provider installer interactively')
      await runCommand('bash', [script], { dryRun: ctx.options.dryRun, logger: ctx.logger }).catch((error: unknown) => {
        throw new ProvisionError(ProvisionErrorCode.INSTALL_FAILED, `Provider installer failed: ${errorMessage(error)}`)
      })
    }
  })

  if (ctx.options.dryRun) {
    ctx.logger.log(`[dry-run] verify ${PROVIDER_BIN} on PATH`)
    return true
  }

  await sleep(ctx.options.settleDelayMs)
  if (!(await providerInstalled(ctx))) {
    throw new ProvisionError(
      ProvisionErrorCode.AGENT_MISSING,
      `${PROVIDER_BIN} still not found after install. Install it manually with: ${manualInstallHint(ctx.options)}`
    )
  }
  ctx.logger.ok(`${PROVIDER_BIN} installed`)
  return true
}

async function runScriptedInstall(ctx: InstallerContext, script: string): Promise<void> {
  const steps = providerPromptSteps(ctx.options)
  ctx.logger.info(`Running the provider installer non-interactively (node ${ctx.options.nodeName})`)
  if (ctx.options.dryRun) {
    for (const step of steps) ctx.logger.log(`[dry-run] answer ${step.name} prompt /${step.pattern.source}/ with "${step.response}"`)
    return
  }
  const proc = spawnInteractive('bash', [script])
  const result = await runScriptedSession(proc, steps, { onOutput: (chunk) => process.stdout.write(chunk) })
  if (result.exitCode !== 0) {
    throw new ProvisionError(ProvisionErrorCode.INSTALL_FAILED, `Provider installer exited with code ${result.exitCode}`)
  }
}
